import { z } from "zod";
import { splitCollection } from "@/binding/collectionFormat";
import type { SchemaDescriptor } from "@/binding/descriptor";
import {
  type BindingError,
  malformedCollection,
  malformedValue,
  missingRequired,
} from "@/binding/errors";
import { type BoundValue, CalendarDate, type JsonValue } from "@/binding/values";

export type Coercion =
  | { ok: true; value: BoundValue }
  | { ok: false; errors: BindingError[] };

const INTEGER_TEXT = /^[+-]?\d+$/;
const DECIMAL_TEXT = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const INTEGER_RANGES: Record<string, readonly [bigint, bigint]> = {
  int32: [-(2n ** 31n), 2n ** 31n - 1n],
  int64: [-(2n ** 63n), 2n ** 63n - 1n],
};
const SAFE_RANGE = [BigInt(Number.MIN_SAFE_INTEGER), BigInt(Number.MAX_SAFE_INTEGER)] as const;

// formats checked here still bind as plain strings, apart from byte and date-time
const STRING_FORMATS: Record<string, z.ZodString> = {
  "date-time": z.string().datetime({ offset: true }),
  byte: z.string().base64(),
  uuid: z.string().uuid(),
  email: z.string().email(),
  uri: z.string().url(),
  ipv4: z.string().ip({ version: "v4" }),
  ipv6: z.string().ip({ version: "v6" }),
};

/** Label used in error messages, e.g. `int64` or `boolean`. */
export function typeLabel(schema: SchemaDescriptor): string {
  return schema.format ?? schema.type ?? "value";
}

function fromInteger(value: bigint, format: string | undefined): number | bigint | undefined {
  const [min, max] = (format && INTEGER_RANGES[format]) || SAFE_RANGE;
  if (value < min || value > max) return undefined;
  return format === "int64" ? value : Number(value);
}

function fromNumber(value: number, format: string | undefined): number | undefined {
  if (!Number.isFinite(value)) return undefined;
  if (format === "float") {
    // values past the single-precision range round to Infinity
    const rounded = Math.fround(value);
    return Number.isFinite(rounded) ? rounded : undefined;
  }
  return value;
}

/**
 * Parses one item string as a scalar of the given type and format.
 * Returns undefined when the text is not a valid literal.
 */
export function parseScalar(
  text: string,
  schema: SchemaDescriptor,
): BoundValue | undefined {
  switch (schema.type) {
    case "integer":
      return INTEGER_TEXT.test(text) ? fromInteger(BigInt(text), schema.format) : undefined;
    case "number":
      return DECIMAL_TEXT.test(text) ? fromNumber(Number(text), schema.format) : undefined;
    case "boolean":
      if (text === "true") return true;
      if (text === "false") return false;
      return undefined;
    case "string":
    case undefined:
      return parseString(text, schema.format);
    default:
      return undefined;
  }
}

function parseString(text: string, format: string | undefined): BoundValue | undefined {
  if (format === "date") return CalendarDate.parse(text);

  const check = format ? STRING_FORMATS[format] : undefined;
  if (check && !check.safeParse(text).success) return undefined;

  switch (format) {
    case "date-time":
      return new Date(text);
    case "byte":
      return Buffer.from(text, "base64");
    default:
      return text;
  }
}

/**
 * Coerces the raw text fragments of a non-body parameter. Arrays go through
 * the collection splitter first; item failures are reported as
 * malformed-collection errors.
 */
export function coerceFragments(
  fragments: readonly string[],
  schema: SchemaDescriptor,
  name: string,
  location: string,
): Coercion {
  if (schema.type !== "array") {
    const [text = ""] = fragments;
    const value = parseScalar(text, schema);
    return value === undefined
      ? { ok: false, errors: [malformedValue(name, location, typeLabel(schema), text)] }
      : { ok: true, value };
  }
  return coerceItems(splitCollection(fragments, schema.collectionFormat), schema, name, location);
}

function coerceItems(
  items: readonly string[],
  schema: SchemaDescriptor,
  name: string,
  location: string,
): Coercion {
  const itemSchema = schema.items ?? { type: "string" };
  const values: BoundValue[] = [];
  const errors: BindingError[] = [];

  items.forEach((item, index) => {
    if (itemSchema.type === "array") {
      // nested arrays carry their own separator inside each item
      const nested = coerceItems(
        splitCollection([item], itemSchema.collectionFormat),
        itemSchema,
        name,
        location,
      );
      if (nested.ok) values.push(nested.value);
      else errors.push(...nested.errors);
      return;
    }
    const value = parseScalar(item, itemSchema);
    if (value === undefined) {
      errors.push(
        malformedCollection(
          name,
          location,
          `item ${index} must be of type ${typeLabel(itemSchema)}: ${JSON.stringify(item)}`,
        ),
      );
      return;
    }
    values.push(value);
  });

  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: values };
}

export interface GenericCoercionOptions {
  /**
   * Accept text for non-string targets and split text for arrays. Declared
   * defaults are coerced this way; decoded bodies are not.
   */
  readonly acceptText?: boolean;
}

/**
 * Coerces an already decoded value (a body payload or a declared default)
 * into the declared schema, recursing into arrays and object properties.
 * Every failing leaf is reported with a dotted path.
 */
export function coerceGeneric(
  value: unknown,
  schema: SchemaDescriptor,
  path: string,
  location: string,
  options: GenericCoercionOptions = {},
): Coercion {
  const invalid = (): Coercion => ({
    ok: false,
    errors: [malformedValue(path, location, typeLabel(schema), describe(value))],
  });

  if (typeof value === "string" && schema.type !== "string" && schema.type !== undefined) {
    if (!options.acceptText || schema.type === "object" || schema.type === "file") {
      return invalid();
    }
    return coerceFragments([value], schema, path, location);
  }

  switch (schema.type) {
    case undefined:
      return isJsonValue(value) ? { ok: true, value: copyJson(value) } : invalid();

    case "string":
      return coerceStringValue(value, schema, path, location, invalid);

    case "integer": {
      let integer: number | bigint | undefined;
      if (typeof value === "bigint") integer = fromInteger(value, schema.format);
      else if (typeof value === "number" && Number.isInteger(value)) {
        integer = fromInteger(BigInt(value), schema.format);
      }
      return integer === undefined ? invalid() : { ok: true, value: integer };
    }

    case "number": {
      const number = typeof value === "number" ? fromNumber(value, schema.format) : undefined;
      return number === undefined ? invalid() : { ok: true, value: number };
    }

    case "boolean":
      return typeof value === "boolean" ? { ok: true, value } : invalid();

    case "array":
      return Array.isArray(value)
        ? coerceArray(value, schema, path, location, options)
        : invalid();

    case "object":
      return isRecord(value) ? coerceObject(value, schema, path, location, options) : invalid();

    case "file":
      return invalid();
  }
}

function coerceStringValue(
  value: unknown,
  schema: SchemaDescriptor,
  path: string,
  location: string,
  invalid: () => Coercion,
): Coercion {
  if (typeof value === "string") {
    const parsed = parseString(value, schema.format);
    return parsed === undefined
      ? { ok: false, errors: [malformedValue(path, location, typeLabel(schema), value)] }
      : { ok: true, value: parsed };
  }
  if (schema.format === "date" && value instanceof CalendarDate) {
    return { ok: true, value };
  }
  if (schema.format === "date-time" && value instanceof Date && !Number.isNaN(value.getTime())) {
    return { ok: true, value: new Date(value.getTime()) };
  }
  if (schema.format === "byte" && value instanceof Uint8Array) {
    return { ok: true, value: Buffer.from(value) };
  }
  return invalid();
}

function coerceArray(
  value: readonly unknown[],
  schema: SchemaDescriptor,
  path: string,
  location: string,
  options: GenericCoercionOptions,
): Coercion {
  const itemSchema = schema.items ?? {};
  const values: BoundValue[] = [];
  const errors: BindingError[] = [];

  value.forEach((item, index) => {
    const coerced = coerceGeneric(item, itemSchema, `${path}.${index}`, location, options);
    if (coerced.ok) values.push(coerced.value);
    else errors.push(...coerced.errors);
  });

  return errors.length > 0 ? { ok: false, errors } : { ok: true, value: values };
}

function coerceObject(
  value: Readonly<Record<string, unknown>>,
  schema: SchemaDescriptor,
  path: string,
  location: string,
  options: GenericCoercionOptions,
): Coercion {
  const properties = schema.properties ?? {};
  const required = new Set(schema.required ?? []);
  // collected as entries: assigning into a literal would run the __proto__ setter
  const entries: Array<[string, BoundValue]> = [];
  const errors: BindingError[] = [];

  for (const [key, raw] of Object.entries(value)) {
    if (raw === null) {
      // a null required property is reported once, below
      if (!required.has(key)) entries.push([key, null]);
      continue;
    }
    const propertySchema = Object.hasOwn(properties, key) ? properties[key] : undefined;
    const coerced = coerceGeneric(raw, propertySchema ?? {}, `${path}.${key}`, location, options);
    if (coerced.ok) entries.push([key, coerced.value]);
    else errors.push(...coerced.errors);
  }

  for (const key of required) {
    if (!Object.hasOwn(value, key) || value[key] === null) {
      errors.push(missingRequired(`${path}.${key}`, location));
    }
  }

  return errors.length > 0
    ? { ok: false, errors }
    : { ok: true, value: Object.fromEntries(entries) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (value === null) return true;
      if (Array.isArray(value)) return value.every(isJsonValue);
      return (
        Object.getPrototypeOf(value) === Object.prototype &&
        Object.values(value).every(isJsonValue)
      );
    default:
      return false;
  }
}

/**
 * Fresh copy of a JSON value. Declared defaults are frozen and shared by every
 * bind, so each destination gets its own containers.
 */
export function copyJson(value: JsonValue): JsonValue {
  if (Array.isArray(value)) return value.map(copyJson);
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([key, v]): [string, JsonValue] => [key, copyJson(v)]));
  }
  return value;
}

function describe(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Uint8Array) return `<${value.length} bytes>`;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
