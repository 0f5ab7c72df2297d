import { parse, type ParsedMediaType } from "content-type";

export type MediaType = ParsedMediaType;

export const FORM_URLENCODED = "application/x-www-form-urlencoded";
export const MULTIPART_FORM = "multipart/form-data";

export type MediaTypeParse =
  | { ok: true; mediaType: MediaType }
  | { ok: false; reason: string };

/** Parses a Content-Type header value; the type is lower-cased. */
export function parseMediaType(header: string | undefined): MediaTypeParse {
  if (header === undefined || header.trim() === "") {
    return { ok: false, reason: "request has no content type" };
  }
  try {
    return { ok: true, mediaType: parse(header) };
  } catch {
    return { ok: false, reason: `malformed content type ${JSON.stringify(header)}` };
  }
}
