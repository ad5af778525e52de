/**
 * Raised when required configuration is absent or malformed.
 * Always fatal: the run stops before any remote call.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * A failed catalog request. `retryAfterSeconds` is only set when the
 * service sent a Retry-After header.
 */
export class CatalogError extends Error {
  readonly status: number;
  readonly retryAfterSeconds: number | undefined;

  constructor(message: string, status: number, retryAfterSeconds?: number) {
    super(message);
    this.name = "CatalogError";
    this.status = status;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export function isRateLimited(error: unknown): error is CatalogError {
  return error instanceof CatalogError && error.status === 429;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
