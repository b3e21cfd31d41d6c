export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

/**
 * Raised by a chunk store whose category-filtered search path is missing
 * (for example the SQL function was never installed). Callers fall back to
 * an unfiltered search.
 */
export class CategorySearchUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CategorySearchUnavailableError";
  }
}

export class ExternalServiceError extends Error {
  constructor(
    readonly service: string,
    readonly status: number | null,
    message: string,
  ) {
    super(`${service} failed${status === null ? "" : ` (${status})`}: ${message}`);
    this.name = "ExternalServiceError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
