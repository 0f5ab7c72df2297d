import busboy from "busboy";
import type { Readable } from "node:stream";
import { UploadedFile } from "@/binding/values";

/** Parsed form fields and file parts, keyed by field name. */
export interface FormSource {
  readonly fields: ReadonlyMap<string, readonly string[]>;
  readonly files: ReadonlyMap<string, readonly UploadedFile[]>;
}

function append<T>(map: Map<string, T[]>, key: string, value: T): void {
  const existing = map.get(key);
  if (existing) existing.push(value);
  else map.set(key, [value]);
}

function decodeComponent(text: string): string {
  return decodeURIComponent(text.replace(/\+/g, " "));
}

/**
 * Decodes `application/x-www-form-urlencoded` text (also used for query
 * strings). Throws URIError on a malformed percent escape.
 */
export function parseUrlEncoded(text: string): Map<string, string[]> {
  const values = new Map<string, string[]>();
  for (const pair of text.split("&")) {
    if (pair === "") continue;
    const eq = pair.indexOf("=");
    const key = eq === -1 ? pair : pair.slice(0, eq);
    const value = eq === -1 ? "" : pair.slice(eq + 1);
    append(values, decodeComponent(key), decodeComponent(value));
  }
  return values;
}

export interface MultipartLimits {
  readonly maxFileSize: number;
  readonly maxFieldSize: number;
}

/**
 * Parses a buffered multipart/form-data payload. File parts are collected in
 * memory; a file part larger than `maxFileSize` or a text field larger than
 * `maxFieldSize` rejects the whole form.
 */
export function parseMultipart(
  payload: Buffer,
  contentType: string,
  limits: MultipartLimits,
): Promise<FormSource> {
  return new Promise<FormSource>((resolve, reject) => {
    let parser: busboy.Busboy;
    try {
      parser = busboy({
        headers: { "content-type": contentType },
        limits: { fileSize: limits.maxFileSize, fieldSize: limits.maxFieldSize },
      });
    } catch (error) {
      reject(error);
      return;
    }

    const fields = new Map<string, string[]>();
    const files = new Map<string, UploadedFile[]>();
    const pending: Array<Promise<void>> = [];

    parser.on("field", (name: string, value: string, info: busboy.FieldInfo) => {
      if (info.valueTruncated) {
        reject(new Error(`form field "${name}" exceeds ${limits.maxFieldSize} bytes`));
        return;
      }
      append(fields, name, value);
    });
    parser.on("file", (name: string, stream: Readable, info: busboy.FileInfo) => {
      const chunks: Buffer[] = [];
      // settles once the part is drained; failures reject the whole form directly
      pending.push(
        new Promise<void>((done) => {
          stream.on("data", (chunk: Buffer) => chunks.push(chunk));
          stream.on("limit", () =>
            reject(new Error(`file part "${name}" exceeds ${limits.maxFileSize} bytes`)),
          );
          stream.on("error", (error: Error) => {
            reject(error);
            done();
          });
          stream.on("end", () => {
            append(
              files,
              name,
              new UploadedFile(name, info.filename, info.mimeType, Buffer.concat(chunks)),
            );
            done();
          });
        }),
      );
    });
    parser.on("error", reject);
    parser.on("close", () => {
      void Promise.all(pending).then(() => resolve({ fields, files }));
    });

    parser.end(payload);
  });
}
