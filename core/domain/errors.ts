// core/domain/errors.ts

export type EngineErrorCode =
  | "INVALID_CONFIGURATION"
  | "INVALID_INPUT"
  | "MODEL_UNAVAILABLE"
  | "PROFILE_UNAVAILABLE"
  | "BATCH_TIMEOUT";

export class EngineError extends Error {
  readonly code: EngineErrorCode;
  readonly details: unknown;

  constructor(code: EngineErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details ?? null;
  }
}

/** Malformed taxonomy or scoring configuration. Fatal at startup. */
export class InvalidConfigurationError extends EngineError {
  constructor(message: string, details?: unknown) {
    super("INVALID_CONFIGURATION", message, details);
  }
}

/** Malformed job description. Fails only the request that carried it. */
export class InvalidInputError extends EngineError {
  constructor(message: string, details?: unknown) {
    super("INVALID_INPUT", message, details);
  }
}

/** Embedding backend could not load or respond. The scorer degrades instead of failing. */
export class ModelUnavailableError extends EngineError {
  constructor(message: string, details?: unknown) {
    super("MODEL_UNAVAILABLE", message, details);
  }
}

/** A batch candidate whose profile could not be produced upstream. */
export class ProfileUnavailableError extends EngineError {
  constructor(message: string, details?: unknown) {
    super("PROFILE_UNAVAILABLE", message, details);
  }
}

export function errorCodeOf(err: unknown): string {
  if (err instanceof EngineError) return err.code;
  return "UNKNOWN_ERROR";
}

export function errorMessageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
