import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import type { ErrorResponse } from '../types/index.js';

/**
 * Maps known error codes to HTTP status codes.
 * Unrecognised codes default to 500.
 */
const STATUS_MAP: Record<string, number> = {
  VALIDATION_ERROR: 400,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  STORE_UNAVAILABLE: 503,
};

/**
 * Derives an error code from a Fastify error or falls back to INTERNAL_ERROR.
 */
function deriveErrorCode(error: FastifyError | Error): string {
  if ('code' in error && typeof error.code === 'string') {
    // Fastify validation errors use FST_ERR_VALIDATION
    if (error.code.startsWith('FST_ERR_VALIDATION')) return 'VALIDATION_ERROR';
    return error.code;
  }
  return 'INTERNAL_ERROR';
}

/**
 * Structured error handler for the Fastify server.
 * Returns consistent JSON error responses.
 */
export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply,
): void {
  const code = deriveErrorCode(error);
  const statusCode = error.statusCode || (STATUS_MAP[code] ?? 500);

  if (statusCode >= 500) {
    request.log.error({ err: error }, 'Request failed');
  }

  const response: ErrorResponse = {
    error: {
      code,
      message: error.message || 'An unexpected error occurred',
    },
  };

  // Include validation details in non-production environments
  if (process.env.NODE_ENV !== 'production' && error.validation) {
    response.error.details = error.validation;
  }

  reply.status(statusCode).send(response);
}
