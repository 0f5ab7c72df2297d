import type { IncomingHttpHeaders } from "node:http";
import type { Readable } from "node:stream";
import getRawBody from "raw-body";
import type { Consumer } from "@/binding/consumers";
import type { ParameterDescriptor } from "@/binding/descriptor";
import {
  type BindingError,
  type BindingErrorKind,
  decodeFailure,
  malformedValue,
  missingFilePart,
  unsupportedMediaType,
} from "@/binding/errors";
import { type FormSource, parseMultipart, parseUrlEncoded } from "@/binding/form";
import {
  FORM_URLENCODED,
  MULTIPART_FORM,
  type MediaTypeParse,
  parseMediaType,
} from "@/binding/mediaType";
import type { JsonValue, UploadedFile } from "@/binding/values";

/** The parts of an HTTP request the binder reads. An Express request fits. */
export interface BindRequest {
  /** Request target: path plus optional query string. */
  readonly url: string;
  readonly headers: IncomingHttpHeaders;
  readonly body?: Readable;
}

/** Values matched from the path template by the router. */
export type RouteParams = Readonly<Record<string, string | undefined>>;

export interface ReadLimits {
  readonly bodyLimit: string | number;
  readonly maxFileSize: number;
  readonly maxFieldSize: number;
}

export type Extraction =
  | { kind: "absent" }
  | { kind: "present"; fragments: readonly string[] }
  | { kind: "file"; file: UploadedFile }
  | { kind: "failed"; error: BindingError };

export type BodyExtraction =
  | { kind: "absent" }
  | { kind: "decoded"; value: JsonValue }
  | { kind: "failed"; error: BindingError };

type Failure = { ok: false; kind: BindingErrorKind; reason: string };

type Read<T> = { ok: true; value: T } | Failure;

function failure(kind: BindingErrorKind, reason: string): Failure {
  return { ok: false, kind, reason };
}

function toBindingError(name: string, location: string, read: Failure): BindingError {
  if (read.kind === "unsupported-media-type") {
    return unsupportedMediaType(name, location, read.reason);
  }
  return decodeFailure(name, location, read.reason);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * State owned by a single bind call. The request body is read at most once
 * and shared by the form, file and body extractors.
 */
export class BindContext {
  private payload?: Promise<Read<Buffer>>;
  private form?: Promise<Read<FormSource>>;
  private query?: Read<ReadonlyMap<string, readonly string[]>>;
  private readonly claimedFiles = new Map<string, string>();
  private bodyOwner?: string;

  constructor(
    readonly request: BindRequest,
    readonly routeParams: RouteParams,
    readonly consumer: Consumer,
    private readonly limits: ReadLimits,
  ) {}

  mediaType(): MediaTypeParse {
    return parseMediaType(this.header("content-type"));
  }

  header(name: string): string | undefined {
    const value = this.request.headers[name.toLowerCase()];
    return Array.isArray(value) ? value[0] : value;
  }

  queryValues(): Read<ReadonlyMap<string, readonly string[]>> {
    if (!this.query) {
      const { url } = this.request;
      const start = url.indexOf("?");
      const end = url.indexOf("#");
      const search = start === -1 ? "" : url.slice(start + 1, end > start ? end : undefined);
      try {
        this.query = { ok: true, value: parseUrlEncoded(search) };
      } catch (error) {
        this.query = failure("decode-failure", `malformed query string: ${errorMessage(error)}`);
      }
    }
    return this.query;
  }

  readPayload(): Promise<Read<Buffer>> {
    this.payload ??= this.loadPayload();
    return this.payload;
  }

  private async loadPayload(): Promise<Read<Buffer>> {
    const { body } = this.request;
    if (!body) return { ok: true, value: Buffer.alloc(0) };
    if (body.readableEnded || body.readableDidRead || body.destroyed) {
      return failure("decode-failure", "request body has already been consumed");
    }
    try {
      const value = await getRawBody(body, {
        limit: this.limits.bodyLimit,
        length: this.header("content-length"),
      });
      return { ok: true, value };
    } catch (error) {
      return failure("decode-failure", errorMessage(error));
    }
  }

  readForm(): Promise<Read<FormSource>> {
    this.form ??= this.loadForm();
    return this.form;
  }

  private async loadForm(): Promise<Read<FormSource>> {
    const parsed = this.mediaType();
    if (!parsed.ok) return failure("unsupported-media-type", parsed.reason);
    const { type } = parsed.mediaType;
    if (type !== FORM_URLENCODED && type !== MULTIPART_FORM) {
      return failure(
        "unsupported-media-type",
        `expected ${MULTIPART_FORM} or ${FORM_URLENCODED}, got ${type}`,
      );
    }

    const payload = await this.readPayload();
    if (!payload.ok) return payload;

    try {
      if (type === FORM_URLENCODED) {
        const fields = parseUrlEncoded(payload.value.toString("utf8"));
        return { ok: true, value: { fields, files: new Map<string, UploadedFile[]>() } };
      }
      const form = await parseMultipart(payload.value, this.header("content-type") ?? "", {
        maxFileSize: this.limits.maxFileSize,
        maxFieldSize: this.limits.maxFieldSize,
      });
      return { ok: true, value: form };
    } catch (error) {
      return failure("decode-failure", `malformed form data: ${errorMessage(error)}`);
    }
  }

  /**
   * Reads and decodes the body once. An empty payload decodes to undefined,
   * which the binder treats as an absent body.
   */
  async decodeBody(): Promise<Read<JsonValue | undefined>> {
    const payload = await this.readPayload();
    if (!payload.ok) return payload;
    if (payload.value.length === 0) return { ok: true, value: undefined };

    const parsed = this.mediaType();
    if (!parsed.ok) return failure("unsupported-media-type", parsed.reason);
    if (!this.consumer.supports(parsed.mediaType.type)) {
      return failure("unsupported-media-type", `no consumer for ${parsed.mediaType.type}`);
    }
    try {
      const value = await this.consumer.consume(payload.value, parsed.mediaType);
      return { ok: true, value };
    } catch (error) {
      return failure("decode-failure", errorMessage(error));
    }
  }

  /** Returns the field that already owns the body, or records `field` as owner. */
  claimBody(field: string): string | undefined {
    if (this.bodyOwner !== undefined) return this.bodyOwner;
    this.bodyOwner = field;
    return undefined;
  }

  /** Returns the field that already owns the file part, or records `field` as owner. */
  claimFile(part: string, field: string): string | undefined {
    const owner = this.claimedFiles.get(part);
    if (owner !== undefined) return owner;
    this.claimedFiles.set(part, field);
    return undefined;
  }
}

async function extractForm(
  descriptor: ParameterDescriptor,
  context: BindContext,
): Promise<Extraction> {
  const form = await context.readForm();
  if (!form.ok) return { kind: "failed", error: toBindingError(descriptor.name, "form", form) };
  const values = form.value.fields.get(descriptor.name);
  return values ? { kind: "present", fragments: values } : { kind: "absent" };
}

async function extractFile(
  descriptor: ParameterDescriptor,
  context: BindContext,
): Promise<Extraction> {
  const { name } = descriptor;
  const parsed = context.mediaType();
  if (!parsed.ok) {
    return { kind: "failed", error: unsupportedMediaType(name, "file", parsed.reason) };
  }
  if (parsed.mediaType.type !== MULTIPART_FORM) {
    return {
      kind: "failed",
      error: unsupportedMediaType(
        name,
        "file",
        `expected ${MULTIPART_FORM}, got ${parsed.mediaType.type}`,
      ),
    };
  }

  const form = await context.readForm();
  if (!form.ok) return { kind: "failed", error: toBindingError(name, "file", form) };

  const [file] = form.value.files.get(name) ?? [];
  if (file) return { kind: "file", file };
  if (form.value.fields.has(name)) {
    return { kind: "failed", error: malformedValue(name, "file", "file", "<text field>") };
  }
  return { kind: "failed", error: missingFilePart(name) };
}

/**
 * Pulls the raw value(s) of a non-body parameter out of the request.
 * Locations are assumed to have been checked by the caller.
 */
export async function extract(
  descriptor: ParameterDescriptor,
  context: BindContext,
): Promise<Extraction> {
  const { name } = descriptor;

  switch (descriptor.in) {
    case "path": {
      const value = context.routeParams[name];
      return value === undefined ? { kind: "absent" } : { kind: "present", fragments: [value] };
    }
    case "query": {
      const query = context.queryValues();
      if (!query.ok) return { kind: "failed", error: toBindingError(name, "query", query) };
      const values = query.value.get(name);
      return values ? { kind: "present", fragments: values } : { kind: "absent" };
    }
    case "header": {
      const value = context.header(name);
      return value === undefined ? { kind: "absent" } : { kind: "present", fragments: [value] };
    }
    case "form":
      return extractForm(descriptor, context);
    case "file":
      return extractFile(descriptor, context);
    default:
      return { kind: "absent" };
  }
}

/** Decodes the request body for the (single) body parameter. */
export async function extractBody(
  descriptor: ParameterDescriptor,
  context: BindContext,
): Promise<BodyExtraction> {
  const decoded = await context.decodeBody();
  if (!decoded.ok) {
    return { kind: "failed", error: toBindingError(descriptor.name, "body", decoded) };
  }
  return decoded.value === undefined
    ? { kind: "absent" }
    : { kind: "decoded", value: decoded.value };
}
