export class RepoCleanerError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "RepoCleanerError";
    this.code = code;
  }
}

// ── Domain errors ──

export class ConfigError extends RepoCleanerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "CONFIG", options);
    this.name = "ConfigError";
  }
}

/** Raised when an operation needs context the operator has not set yet. */
export class StateError extends RepoCleanerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "STATE", options);
    this.name = "StateError";
  }
}

export class BitbucketApiError extends RepoCleanerError {
  readonly status: number;

  constructor(message: string, status: number, options?: ErrorOptions) {
    super(message, "API", options);
    this.name = "BitbucketApiError";
    this.status = status;
  }
}

// ── Utilities ──

/** Coerce unknown thrown value to RepoCleanerError (preserves cause chain). */
export function toRepoCleanerError(value: unknown): RepoCleanerError {
  if (value instanceof RepoCleanerError) return value;
  if (value instanceof Error) return new RepoCleanerError(value.message, "UNKNOWN", { cause: value });
  return new RepoCleanerError(String(value ?? "Unknown error"), "UNKNOWN");
}

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return "Unknown error";
  return String(value);
}
