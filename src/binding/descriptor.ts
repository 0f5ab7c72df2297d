import { z } from "zod";
import { AppError } from "@/utils/errors/AppError";
import type { ValidationDetails } from "@/types/validation";

export const LOCATIONS = ["path", "query", "header", "form", "file", "body"] as const;
export type ParameterLocation = (typeof LOCATIONS)[number];

export const SCHEMA_TYPES = [
  "string",
  "integer",
  "number",
  "boolean",
  "array",
  "object",
  "file",
] as const;
export type SchemaType = (typeof SCHEMA_TYPES)[number];

export const COLLECTION_FORMATS = ["csv", "ssv", "tsv", "pipes", "multi"] as const;
export type CollectionFormat = (typeof COLLECTION_FORMATS)[number];

/** Type information shared by parameters, array items and body schemas. */
export interface SchemaDescriptor {
  readonly type?: SchemaType;
  readonly format?: string;
  readonly collectionFormat?: CollectionFormat;
  readonly items?: SchemaDescriptor;
  readonly properties?: Readonly<Record<string, SchemaDescriptor>>;
  /** Names of required properties, for `object` schemas. */
  readonly required?: readonly string[];
  readonly default?: unknown;
}

export interface ParameterDescriptor extends Omit<SchemaDescriptor, "required" | "properties"> {
  /** Wire name: the path segment, query key, header, form field or file part. */
  readonly name: string;
  /**
   * Kept as a plain string so that unrecognised locations surface as
   * binding errors instead of failing construction.
   */
  readonly in: ParameterLocation | (string & {});
  readonly required?: boolean;
  /** Shape of the decoded payload, for `body` parameters. */
  readonly schema?: SchemaDescriptor;
}

/** Descriptors keyed by the destination field they populate. */
export type ParameterMap<D> = {
  readonly [K in keyof D & string]?: ParameterDescriptor;
};

export class BinderConfigurationError extends AppError {
  constructor(message: string, details?: ValidationDetails) {
    super(message, 500, false, details);
    this.name = "BinderConfigurationError";
  }
}

const schemaDescriptorSchema: z.ZodType<SchemaDescriptor> = z.lazy(() =>
  z
    .object({
      type: z.enum(SCHEMA_TYPES).optional(),
      format: z.string().optional(),
      collectionFormat: z.enum(COLLECTION_FORMATS).optional(),
      items: schemaDescriptorSchema.optional(),
      properties: z.record(schemaDescriptorSchema).optional(),
      required: z.array(z.string()).optional(),
      default: z.unknown().optional(),
    })
    .strict()
    .superRefine((schema, ctx) => {
      if (schema.type === "array" && !schema.items) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "array schemas must declare items",
          path: ["items"],
        });
      }
    }),
);

const parameterDescriptorSchema = z
  .object({
    name: z.string(),
    in: z.string(),
    type: z.enum(SCHEMA_TYPES).optional(),
    format: z.string().optional(),
    collectionFormat: z.enum(COLLECTION_FORMATS).optional(),
    items: schemaDescriptorSchema.optional(),
    required: z.boolean().optional(),
    default: z.unknown().optional(),
    schema: schemaDescriptorSchema.optional(),
  })
  .strict()
  .superRefine((param, ctx) => {
    if (param.type === "array" && !param.items) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "array parameters must declare items",
        path: ["items"],
      });
    }
  });

/**
 * Checks the descriptor shapes and returns frozen copies in declaration
 * order. Throws {@link BinderConfigurationError} listing every problem.
 */
export function freezeDescriptors(
  parameters: object,
): ReadonlyArray<readonly [string, ParameterDescriptor]> {
  const frozen: Array<readonly [string, ParameterDescriptor]> = [];
  const details: ValidationDetails = [];
  const entries: Array<[string, unknown]> = Object.entries(parameters);

  for (const [field, descriptor] of entries) {
    if (descriptor === undefined) continue;
    const result = parameterDescriptorSchema.safeParse(descriptor);
    if (!result.success) {
      for (const issue of result.error.issues) {
        details.push({
          path: [field, ...issue.path].join("."),
          message: issue.message,
          code: issue.code,
        });
      }
      continue;
    }
    const parsed: ParameterDescriptor = result.data;
    frozen.push([field, deepFreeze(parsed)]);
  }

  if (details.length > 0) {
    throw new BinderConfigurationError("Invalid parameter descriptors", details);
  }
  return Object.freeze(frozen);
}

// defaults may hold Buffers, Dates and other class instances; leave those alone
function deepFreeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (isPlainContainer(nested) && !Object.isFrozen(nested)) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

function isPlainContainer(value: unknown): value is object {
  if (typeof value !== "object" || value === null) return false;
  return Array.isArray(value) || Object.getPrototypeOf(value) === Object.prototype;
}
