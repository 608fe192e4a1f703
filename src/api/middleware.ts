/**
 * API Middleware — error translation.
 */

import { Request, Response, NextFunction } from 'express';
import { FlowError, TypedError, apiError, createTypedError } from '../domain/errors';
import { logger } from '../logger';

const log = logger.child({ module: 'api' });

/** HTTP status for a typed error code. */
export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('DECOMPILE.')) return 400;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.startsWith('GRAPH.')) return 422;
  if (error.code.startsWith('COMPILE.')) return 422;
  return 500;
}

/** Send a typed error. */
export function sendTypedError(res: Response, error: TypedError, details?: Record<string, unknown>): void {
  const status = getHttpStatus(error);
  log.warn('Request error', { code: error.code, status });
  res.status(status).json(apiError(details ? { ...error, details: { ...error.details, ...details } } : error));
}

/** Send whatever a route handler caught. */
export function sendError(res: Response, err: unknown): void {
  if (err instanceof FlowError) {
    sendTypedError(res, err.typedError);
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  log.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json(apiError(createTypedError({ code: 'SYSTEM.INTERNAL', message })));
}

/** Malformed JSON bodies surface here from express.json(). */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof SyntaxError) {
    sendTypedError(res, createTypedError({ code: 'VALIDATION.SCHEMA', message: 'Request body is not valid JSON' }));
    return;
  }
  sendError(res, err);
}
