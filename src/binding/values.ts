import { Readable } from "node:stream";

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * A calendar date without a time of day, as carried by `string/date`
 * parameters (`2014-08-09`).
 */
export class CalendarDate {
  constructor(
    public readonly year: number,
    public readonly month: number,
    public readonly day: number,
  ) {}

  /** Parses `YYYY-MM-DD`, returning undefined for impossible dates. */
  static parse(text: string): CalendarDate | undefined {
    const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text);
    if (!match) return undefined;
    const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
    const probe = new Date(Date.UTC(year, month - 1, day));
    if (
      probe.getUTCFullYear() !== year ||
      probe.getUTCMonth() !== month - 1 ||
      probe.getUTCDate() !== day
    ) {
      return undefined;
    }
    return new CalendarDate(year, month, day);
  }

  toString(): string {
    const pad = (n: number, width: number) => String(n).padStart(width, "0");
    return `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

/**
 * One uploaded multipart file part. The bytes are held in memory once the
 * form is parsed; `data` hands them out as a stream that can be read once.
 */
export class UploadedFile {
  private opened = false;

  constructor(
    public readonly fieldName: string,
    public readonly filename: string,
    public readonly contentType: string,
    private readonly content: Buffer,
  ) {}

  get size(): number {
    return this.content.length;
  }

  get data(): Readable {
    if (this.opened) {
      throw new Error(`file part "${this.fieldName}" has already been read`);
    }
    this.opened = true;
    return Readable.from([this.content], { objectMode: false });
  }
}

export type BoundValue =
  | string
  | number
  | bigint
  | boolean
  | CalendarDate
  | Date
  | Buffer
  | UploadedFile
  | JsonValue
  | BoundValue[]
  | { [key: string]: BoundValue };
