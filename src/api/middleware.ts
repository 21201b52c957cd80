/**
 * API Middleware — request helpers and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { OrchestratorError, TypedError, apiError, createTypedError, validationError } from '../domain/errors';
import { AuditActor } from '../domain/audit';
import { logger } from '../logger';

/** Plain-object check for parsed request bodies. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The parsed JSON body, or an empty object when there is none. */
export function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  return isRecord(body) ? body : {};
}

/**
 * Actor recorded in the audit ledger for operator requests. Taken from
 * the x-actor-id header; identity is established upstream of this service.
 */
export function actorOf(req: Request): AuditActor {
  const header = req.headers['x-actor-id'];
  const value = Array.isArray(header) ? header[0] : header;
  return value && value.trim() !== '' ? value.trim() : 'anonymous';
}

/** Send the typed error carried by `err`, or a SYSTEM.INTERNAL 500. */
export function sendError(res: Response, err: unknown): void {
  if (err instanceof OrchestratorError) {
    const status = getHttpStatus(err.typedError);
    logger.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  logger.error('Unhandled request error', {
    message: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined,
  });

  res.status(500).json(
    apiError(
      createTypedError({
        code: 'SYSTEM.INTERNAL',
        message: 'Internal server error',
        retryable: false,
      }),
    ),
  );
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  // body-parser marks malformed JSON with type 'entity.parse.failed'
  if (err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed') {
    res.status(400).json(apiError(validationError('Request body is not valid JSON')));
    return;
  }
  sendError(res, err);
}

export function getHttpStatus(error: TypedError): number {
  if (error.code.includes('NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code === 'STATE.CONFLICT' || error.code === 'STATE.INVALID_TRANSITION') return 409;
  if (error.code === 'DRIVER.UNAVAILABLE') return 503;
  if (error.code === 'DRIVER.NOT_REGISTERED') return 404;
  if (error.code.startsWith('CONTRACT.')) return 422;
  if (error.code.startsWith('WEBHOOK.')) return 401;
  if (error.code.startsWith('CREDENTIAL.')) return 422;
  return 500;
}
