/**
 * Errors carrying the machine-readable code and HTTP status that the
 * Fastify error handler turns into an ErrorResponse.
 */
export class HttpError extends Error {
  constructor(
    readonly code: string,
    readonly statusCode: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'HttpError';
  }
}

/** Unknown chat or attachment id. */
export class NotFoundError extends HttpError {
  constructor(message: string) {
    super('NOT_FOUND', 404, message);
    this.name = 'NotFoundError';
  }
}

/** The Messages database could not be opened at all. */
export class StoreUnavailableError extends HttpError {
  constructor(path: string, cause: unknown) {
    super('STORE_UNAVAILABLE', 503, `Cannot open Messages database at ${path}`, { cause });
    this.name = 'StoreUnavailableError';
  }
}
