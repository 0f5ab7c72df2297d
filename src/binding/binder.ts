import { logger } from "@/utils/logger";
import { coerceFragments, coerceGeneric } from "@/binding/coerce";
import type { Consumer } from "@/binding/consumers";
import {
  freezeDescriptors,
  LOCATIONS,
  type ParameterDescriptor,
  type ParameterLocation,
  type ParameterMap,
  type SchemaDescriptor,
} from "@/binding/descriptor";
import {
  type BindingError,
  BindingErrors,
  type BindingResult,
  configurationError,
  malformedCollection,
  missingRequired,
} from "@/binding/errors";
import {
  BindContext,
  type BindRequest,
  extract,
  extractBody,
  type ReadLimits,
  type RouteParams,
} from "@/binding/extractors";
import type { BoundValue } from "@/binding/values";

export interface BinderOptions {
  /** Largest request body read, in bytes or as a `bytes` string such as "1mb". */
  readonly bodyLimit?: string | number;
  /** Largest single multipart file part, in bytes. */
  readonly maxFileSize?: number;
  /** Largest multipart text field, in bytes. */
  readonly maxFieldSize?: number;
}

type Outcome = { ok: true; value?: BoundValue } | { ok: false; errors: BindingError[] };

const LOCATION_SET: ReadonlySet<string> = new Set(LOCATIONS);

function isLocation(value: string): value is ParameterLocation {
  return LOCATION_SET.has(value);
}

function fail(...errors: BindingError[]): Outcome {
  return { ok: false, errors };
}

function schemaOf(descriptor: ParameterDescriptor): SchemaDescriptor {
  if (descriptor.in === "body") return descriptor.schema ?? {};
  const { type, format, collectionFormat, items } = descriptor;
  return { type, format, collectionFormat, items };
}

function usesMulti(schema: SchemaDescriptor | undefined): boolean {
  if (!schema) return false;
  return schema.collectionFormat === "multi" || usesMulti(schema.items);
}

/**
 * Descriptor problems that only show once a bind is attempted. They are
 * reported like any other binding error.
 */
function checkDescriptor(descriptor: ParameterDescriptor): BindingError | undefined {
  const { name, type } = descriptor;
  const location = descriptor.in;

  if (!isLocation(location)) {
    return configurationError(
      name,
      location,
      `unrecognized parameter location ${JSON.stringify(location)}`,
    );
  }
  if (name === "") {
    return configurationError(name, location, "parameter name must not be empty");
  }
  if (location === "body") return undefined;

  if (location !== "query" && usesMulti(schemaOf(descriptor))) {
    return malformedCollection(
      name,
      location,
      "uses collection format multi, which is only supported for query parameters",
    );
  }
  if (location === "file") {
    return type === undefined || type === "file"
      ? undefined
      : configurationError(name, location, `file parameters cannot have type ${type}`);
  }
  if (type === undefined) {
    return configurationError(name, location, "parameter declares no type");
  }
  if (type === "file") {
    return configurationError(name, location, "file parameters must use the file location");
  }
  if (type === "object") {
    return configurationError(name, location, "object parameters are only supported in body");
  }
  return undefined;
}

/**
 * Binds request values into a destination object according to a fixed set
 * of parameter descriptors, collecting every failure instead of stopping at
 * the first one.
 *
 * The binder holds no per-request state, so one instance can serve
 * concurrent requests as long as each call gets its own request and
 * destination.
 *
 * @example
 * const binder = new RequestBinder<PetQuery>({
 *   id: { name: "id", in: "path", type: "integer", format: "int64", required: true },
 *   tags: { name: "tags", in: "query", type: "array", items: { type: "string" } },
 * });
 * const result = await binder.bind(req, req.params, jsonConsumer(), query);
 */
export class RequestBinder<D extends object> {
  private readonly parameters: ReadonlyArray<readonly [string, ParameterDescriptor]>;
  private readonly limits: ReadLimits;

  constructor(parameters: ParameterMap<D>, options: BinderOptions = {}) {
    this.parameters = freezeDescriptors(parameters);
    this.limits = Object.freeze({
      bodyLimit: options.bodyLimit ?? "1mb",
      maxFileSize: options.maxFileSize ?? 10 * 1024 * 1024,
      maxFieldSize: options.maxFieldSize ?? 1024 * 1024,
    });
  }

  async bind(
    request: BindRequest,
    routeParams: RouteParams | null | undefined,
    consumer: Consumer,
    destination: D,
  ): Promise<BindingResult> {
    const context = new BindContext(request, routeParams ?? {}, consumer, this.limits);
    const errors = new BindingErrors();

    for (const [field, descriptor] of this.parameters) {
      const outcome = await this.bindParameter(field, descriptor, context);
      if (!outcome.ok) {
        errors.add(...outcome.errors);
      } else if (outcome.value !== undefined) {
        Reflect.set(destination, field, outcome.value);
      }
    }

    const result = errors.result();
    if (!result.isValid()) {
      logger.debug("request binding failed", {
        url: request.url,
        errors: result.errors.map((e) => `${e.in}.${e.name}: ${e.kind}`),
      });
    }
    return result;
  }

  private async bindParameter(
    field: string,
    descriptor: ParameterDescriptor,
    context: BindContext,
  ): Promise<Outcome> {
    const problem = checkDescriptor(descriptor);
    if (problem) return fail(problem);

    if (descriptor.in === "body") {
      return this.bindBody(field, descriptor, context);
    }

    const extraction = await extract(descriptor, context);
    switch (extraction.kind) {
      case "failed":
        return fail(extraction.error);
      case "absent":
        return this.bindAbsent(descriptor);
      case "file": {
        const owner = context.claimFile(descriptor.name, field);
        if (owner !== undefined) {
          return fail(
            configurationError(descriptor.name, "file", `file part is already bound to ${owner}`),
          );
        }
        return { ok: true, value: extraction.file };
      }
      case "present":
        return this.bindPresent(descriptor, extraction.fragments);
    }
  }

  private bindPresent(descriptor: ParameterDescriptor, fragments: readonly string[]): Outcome {
    const { name, type, required } = descriptor;
    const location = descriptor.in;

    if (type !== "array") {
      const [text = ""] = fragments;
      if (text === "") {
        if (type !== "string") return this.bindAbsent(descriptor);
        if (required) return fail(missingRequired(name, location));
      }
    }

    const coerced = coerceFragments(fragments, schemaOf(descriptor), name, location);
    if (!coerced.ok) return coerced;
    if (required && Array.isArray(coerced.value) && coerced.value.length === 0) {
      return fail(missingRequired(name, location));
    }
    return coerced;
  }

  private bindAbsent(descriptor: ParameterDescriptor): Outcome {
    if (descriptor.default !== undefined) {
      const { name } = descriptor;
      return coerceGeneric(descriptor.default, schemaOf(descriptor), name, descriptor.in, {
        acceptText: true,
      });
    }
    if (descriptor.required) {
      return fail(missingRequired(descriptor.name, descriptor.in));
    }
    return { ok: true };
  }

  private async bindBody(
    field: string,
    descriptor: ParameterDescriptor,
    context: BindContext,
  ): Promise<Outcome> {
    const owner = context.claimBody(field);
    if (owner !== undefined) {
      return fail(
        configurationError(descriptor.name, "body", `request body is already bound to ${owner}`),
      );
    }

    const extraction = await extractBody(descriptor, context);
    switch (extraction.kind) {
      case "failed":
        return fail(extraction.error);
      case "absent":
        return this.bindAbsent(descriptor);
      case "decoded":
        return coerceGeneric(extraction.value, schemaOf(descriptor), descriptor.name, "body");
    }
  }
}
