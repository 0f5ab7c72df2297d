import { describe, expect, it } from "vitest";
import { ConsumerRegistry, jsonConsumer, textConsumer, type Consumer } from "@/binding/consumers";
import type { MediaType } from "@/binding/mediaType";

function mediaType(type: string, parameters: Record<string, string> = {}): MediaType {
  return { type, parameters };
}

describe("jsonConsumer", () => {
  const json = jsonConsumer();

  it("supports JSON and structured +json types", () => {
    expect(json.supports("application/json")).toBe(true);
    expect(json.supports("application/problem+json")).toBe(true);
    expect(json.supports("text/plain")).toBe(false);
  });

  it("decodes a JSON document", () => {
    const payload = Buffer.from('{"a":[1,true,null]}');
    expect(json.consume(payload, mediaType("application/json"))).toEqual({ a: [1, true, null] });
  });

  it("throws on invalid JSON", () => {
    expect(() => json.consume(Buffer.from("{]"), mediaType("application/json"))).toThrow(
      SyntaxError,
    );
  });

  it("honours the charset parameter", () => {
    const payload = Buffer.from([0x22, 0xe9, 0x22]);
    expect(json.consume(payload, mediaType("application/json", { charset: "latin1" }))).toBe("é");
    expect(() =>
      json.consume(payload, mediaType("application/json", { charset: "utf-8" })),
    ).toThrow(TypeError);
  });

  it("rejects an unknown charset", () => {
    expect(() =>
      json.consume(Buffer.from("1"), mediaType("application/json", { charset: "klingon" })),
    ).toThrow(RangeError);
  });
});

describe("textConsumer", () => {
  it("returns text bodies as strings", () => {
    const text = textConsumer();
    expect(text.supports("text/csv")).toBe(true);
    expect(text.supports("application/json")).toBe(false);
    expect(text.consume(Buffer.from("hello"), mediaType("text/plain"))).toBe("hello");
  });
});

describe("ConsumerRegistry", () => {
  it("dispatches on the media type", () => {
    const registry = new ConsumerRegistry();
    expect(registry.consume(Buffer.from("[1]"), mediaType("application/json"))).toEqual([1]);
    expect(registry.consume(Buffer.from("[1]"), mediaType("text/plain"))).toBe("[1]");
  });

  it("throws for a media type nobody handles", () => {
    const registry = new ConsumerRegistry();
    expect(registry.supports("application/xml")).toBe(false);
    expect(() => registry.consume(Buffer.from("<a/>"), mediaType("application/xml"))).toThrow(
      "no consumer registered for application/xml",
    );
  });

  it("uses the consumers it is given, first match wins", () => {
    const shout: Consumer = {
      supports: (type) => type === "text/plain",
      consume: (payload) => payload.toString().toUpperCase(),
    };
    const registry = new ConsumerRegistry([shout, textConsumer()]);
    expect(registry.consume(Buffer.from("hi"), mediaType("text/plain"))).toBe("HI");
    expect(registry.consume(Buffer.from("hi"), mediaType("text/html"))).toBe("hi");
  });
});
