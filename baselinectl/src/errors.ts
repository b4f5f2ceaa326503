export type ErrorCode =
  | "NOT_FOUND"
  | "INVALID_BASELINE"
  | "COMPONENT_NOT_FOUND"
  | "EXTRACTION_FAILED"
  | "RESOURCE_BUDGET_EXCEEDED"
  | "CONFIG_INVALID";

/** Base class for every error the engine raises on purpose. */
export class BaselineCtlError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A model or baseline reference that does not exist. Not retried. */
export class NotFoundError extends BaselineCtlError {
  constructor(readonly ref: string) {
    super("NOT_FOUND", `File not found: ${ref}`);
  }
}

export class InvalidBaselineError extends BaselineCtlError {
  constructor(
    readonly label: string,
    readonly problems: string[],
  ) {
    super("INVALID_BASELINE", `${label} is invalid: ${problems.join("; ")}`);
  }
}

/** Query by name matched nothing; carries up to 10 suggestions and how many were left out. */
export class ComponentNotFoundError extends BaselineCtlError {
  constructor(
    readonly query: string,
    readonly suggestions: string[],
    readonly remaining: number,
  ) {
    super(
      "COMPONENT_NOT_FOUND",
      `Component '${query}' not found. Available components: ${suggestions.join(", ")}` +
        (remaining > 0 ? ` ... and ${remaining} more` : ""),
    );
  }
}

export class ExtractionFailedError extends BaselineCtlError {
  constructor(
    readonly modelPath: string,
    reason: string,
    cause?: unknown,
  ) {
    super("EXTRACTION_FAILED", `Baseline extraction failed for ${modelPath}: ${reason}`, { cause });
  }
}

export class ResourceBudgetError extends BaselineCtlError {
  constructor(message: string) {
    super("RESOURCE_BUDGET_EXCEEDED", message);
  }
}

export class ConfigInvalidError extends BaselineCtlError {
  constructor(errors: string) {
    super("CONFIG_INVALID", `Config invalid: ${errors}`);
  }
}

export function isBaselineCtlError(err: unknown): err is BaselineCtlError {
  return err instanceof BaselineCtlError;
}
