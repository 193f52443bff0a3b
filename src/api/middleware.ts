/**
 * API middleware: error envelopes and status mapping.
 */

import { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { EngineError, TypedError, apiError, createTypedError, validationError } from '../domain/errors';
import { logger } from '../logger';

export function getHttpStatus(error: TypedError): number {
  if (error.code.endsWith('NOT_FOUND')) return 404;
  if (error.code === 'RUN.ALREADY_RUNNING') return 409;
  if (error.code === 'VALIDATION.MALFORMED_BODY') return 400;
  if (error.code.startsWith('CONFIG.')) return 422;
  if (error.code.startsWith('VALIDATION.')) return 422;
  if (error.code.startsWith('TEMPLATE.')) return 422;
  if (error.code.startsWith('EXECUTION.')) return 422;
  if (error.code.startsWith('PARSE.')) return 422;
  return 500;
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/** Normalize anything a route throws into a TypedError. */
export function toApiError(err: unknown): TypedError {
  if (err instanceof EngineError) return err.typedError;
  if (err instanceof ZodError) {
    return validationError('Invalid request body', {
      issues: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    });
  }
  if (isBodyParseError(err)) {
    return createTypedError({ code: 'VALIDATION.MALFORMED_BODY', message: 'Request body is not valid JSON' });
  }
  return createTypedError({
    code: 'SYSTEM.INTERNAL',
    message: err instanceof Error ? err.message : 'Internal server error',
    retryable: false,
  });
}

/** Write an error envelope with the status its code maps to. */
export function sendError(res: Response, err: unknown, extra: Record<string, unknown> = {}): void {
  const typedError = toApiError(err);
  const status = getHttpStatus(typedError);
  if (status >= 500) {
    logger.error('Unhandled request error', {
      message: typedError.message,
      stack: err instanceof Error ? err.stack : undefined,
    });
  } else {
    logger.warn('Request error', { code: typedError.code, status });
  }
  res.status(status).json({ ...apiError(typedError), ...extra });
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  sendError(res, err);
}
