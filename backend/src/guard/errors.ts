// guard/errors.ts
// Error kinds raised by the diversity guard and its stores

export type GuardErrorCode = "INVALID_RECIPE" | "STORE_UNAVAILABLE" | "CONFIGURATION";

export class GuardError extends Error {
  readonly code: GuardErrorCode;

  constructor(code: GuardErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "GuardError";
  }
}

/** The candidate lacks ingredients or steps. Resubmitting the same input will fail again. */
export class InvalidRecipeError extends GuardError {
  constructor(message: string) {
    super("INVALID_RECIPE", message);
    this.name = "InvalidRecipeError";
  }
}

export class StoreUnavailableError extends GuardError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORE_UNAVAILABLE", message, options);
    this.name = "StoreUnavailableError";
  }
}

export class ConfigurationError extends GuardError {
  readonly field: string;

  constructor(field: string, message: string) {
    super("CONFIGURATION", `${field}: ${message}`);
    this.field = field;
    this.name = "ConfigurationError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
