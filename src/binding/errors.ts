import type { ValidationDetails } from "@/types/validation";

export type BindingErrorKind =
  | "missing-required"
  | "malformed-value"
  | "malformed-collection"
  | "unsupported-media-type"
  | "decode-failure"
  | "configuration-error";

export interface BindingError {
  /** Wire name of the parameter, dotted for nested body properties. */
  readonly name: string;
  readonly in: string;
  readonly kind: BindingErrorKind;
  readonly message: string;
}

export function missingRequired(name: string, location: string): BindingError {
  return {
    name,
    in: location,
    kind: "missing-required",
    message: `${name} in ${location} is required`,
  };
}

/** A file parameter whose part is missing from the multipart body, required or not. */
export function missingFilePart(name: string): BindingError {
  return {
    name,
    in: "file",
    kind: "missing-required",
    message: `${name} in file: no file part named ${JSON.stringify(name)}`,
  };
}

export function malformedValue(
  name: string,
  location: string,
  expected: string,
  value: string,
): BindingError {
  return {
    name,
    in: location,
    kind: "malformed-value",
    message: `${name} in ${location} must be of type ${expected}: ${JSON.stringify(value)}`,
  };
}

export function malformedCollection(
  name: string,
  location: string,
  reason: string,
): BindingError {
  return {
    name,
    in: location,
    kind: "malformed-collection",
    message: `${name} in ${location} ${reason}`,
  };
}

export function unsupportedMediaType(
  name: string,
  location: string,
  reason: string,
): BindingError {
  return {
    name,
    in: location,
    kind: "unsupported-media-type",
    message: `${name} in ${location}: ${reason}`,
  };
}

export function decodeFailure(name: string, location: string, reason: string): BindingError {
  return {
    name,
    in: location,
    kind: "decode-failure",
    message: `${name} in ${location} could not be decoded: ${reason}`,
  };
}

export function configurationError(
  name: string,
  location: string,
  reason: string,
): BindingError {
  return {
    name,
    in: location,
    kind: "configuration-error",
    message: `${name || "<unnamed>"} in ${location || "<none>"}: ${reason}`,
  };
}

/** Outcome of a single bind call. */
export class BindingResult {
  constructor(public readonly errors: readonly BindingError[]) {}

  isValid(): boolean {
    return this.errors.length === 0;
  }

  /** One entry per offending parameter, in the shape the HTTP layer reports. */
  toValidationDetails(): ValidationDetails {
    return this.errors.map((error) => ({
      path: `${error.in}.${error.name}`,
      message: error.message,
      code: error.kind,
    }));
  }
}

/**
 * Append-only error list for one bind call. Errors are kept in the order they
 * are added, which the binder keeps aligned with declaration order.
 */
export class BindingErrors {
  private readonly entries: BindingError[] = [];

  add(...errors: BindingError[]): void {
    this.entries.push(...errors);
  }

  get size(): number {
    return this.entries.length;
  }

  result(): BindingResult {
    return new BindingResult(Object.freeze([...this.entries]));
  }
}
