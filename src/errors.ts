/**
 * Error taxonomy
 *
 * Fatal failures (synthesis, registration, load, catalog, refinement
 * infrastructure) are thrown as ExemplarError subclasses with a stable code.
 * Detection problems are never thrown: they accumulate as warnings on
 * ParsedExamples.
 */

export type ErrorCode =
  | "SCHEMA_INFERENCE"
  | "SYNTHESIS"
  | "REGISTRATION"
  | "LOAD"
  | "CATALOG"
  | "REFINEMENT";

export class ExemplarError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Example value that cannot be walked (function, cycle, non-plain object...) */
export class SchemaInferenceError extends ExemplarError {
  readonly path: string;

  constructor(path: string, message: string) {
    super("SCHEMA_INFERENCE", `${message} at ${path}`);
    this.path = path;
  }
}

export class SynthesisError extends ExemplarError {
  readonly template?: string;
  readonly variable?: string;

  constructor(
    message: string,
    details: { template?: string; variable?: string; cause?: unknown } = {}
  ) {
    const where = details.template ? ` (template ${details.template})` : "";
    super("SYNTHESIS", `${message}${where}`, { cause: details.cause });
    this.template = details.template;
    this.variable = details.variable;
  }
}

export type RegistrationFailure = "duplicate" | "namespace" | "invalid";

export class RegistrationError extends ExemplarError {
  readonly reason: RegistrationFailure;

  constructor(reason: RegistrationFailure, message: string) {
    super("REGISTRATION", message);
    this.reason = reason;
  }
}

export type LoadFailure = "not-found" | "namespace" | "unresolved" | "interface";

export class LoadError extends ExemplarError {
  readonly reason: LoadFailure;

  constructor(reason: LoadFailure, message: string, options?: { cause?: unknown }) {
    super("LOAD", message, options);
    this.reason = reason;
  }
}

export class NotFoundError extends LoadError {
  constructor(name: string) {
    super("not-found", `No artifact registered under '${name}'`);
  }
}

export class SecurityError extends LoadError {
  constructor(symbolPath: string, namespaces: readonly string[]) {
    super(
      "namespace",
      `Symbol path '${symbolPath}' is outside the allowed namespaces: ${namespaces.join(", ")}`
    );
  }
}

/** Catalog file exists but is unreadable or of an unknown format */
export class CatalogError extends ExemplarError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("CATALOG", `${message}: ${path}`, options);
    this.path = path;
  }
}

export class RefinementError extends ExemplarError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("REFINEMENT", message, options);
  }
}

/**
 * Throws a RangeError when a confidence is not a number in [0, 1].
 */
export function assertConfidence(value: number, label = "confidence"): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new RangeError(`${label} must be within [0, 1], got ${value}`);
  }
  return value;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
