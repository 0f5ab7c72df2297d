import { isJsonValue } from "@/binding/coerce";
import type { MediaType } from "@/binding/mediaType";
import type { JsonValue } from "@/binding/values";

/**
 * Body decoder for one family of media types. The binder reads the payload
 * and hands it over once per bind call.
 */
export interface Consumer {
  supports(mediaType: string): boolean;
  consume(payload: Buffer, mediaType: MediaType): JsonValue | Promise<JsonValue>;
}

function decodeText(payload: Buffer, mediaType: MediaType): string {
  const charset = mediaType.parameters.charset ?? "utf-8";
  // unknown labels throw a RangeError, invalid byte sequences a TypeError
  return new TextDecoder(charset, { fatal: true }).decode(payload);
}

export function jsonConsumer(): Consumer {
  return {
    supports: (mediaType) => mediaType === "application/json" || mediaType.endsWith("+json"),
    consume(payload, mediaType) {
      const parsed: unknown = JSON.parse(decodeText(payload, mediaType));
      if (!isJsonValue(parsed)) {
        throw new TypeError("payload is not a JSON document");
      }
      return parsed;
    },
  };
}

export function textConsumer(): Consumer {
  return {
    supports: (mediaType) => mediaType.startsWith("text/"),
    consume: (payload, mediaType) => decodeText(payload, mediaType),
  };
}

/** Picks the first registered consumer that supports the request's media type. */
export class ConsumerRegistry implements Consumer {
  private readonly consumers: readonly Consumer[];

  constructor(consumers: readonly Consumer[] = [jsonConsumer(), textConsumer()]) {
    this.consumers = [...consumers];
  }

  supports(mediaType: string): boolean {
    return this.consumers.some((consumer) => consumer.supports(mediaType));
  }

  consume(payload: Buffer, mediaType: MediaType): JsonValue | Promise<JsonValue> {
    const consumer = this.consumers.find((c) => c.supports(mediaType.type));
    if (!consumer) {
      throw new TypeError(`no consumer registered for ${mediaType.type}`);
    }
    return consumer.consume(payload, mediaType);
  }
}
