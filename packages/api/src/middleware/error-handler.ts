import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { InputError } from '@snapcal/shared/src/utils/errors.js';
import { createChildLogger } from '@snapcal/shared/src/logger.js';
import type { AppEnv } from '../types.js';
import { isBodyLimitError, payloadTooLarge } from './body-limit.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

/**
 * Turns every failure into one of three shapes: 400 for problems with the
 * request, 413 for oversized bodies, 500 for everything else. Upstream messages (screenshot service,
 * language model) are logged here and never sent to the client.
 */
export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (isBodyLimitError(err)) {
    log.warn({ requestId }, 'Request body too large');
    return payloadTooLarge(c);
  }

  if (err instanceof ZodError) {
    const details = err.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details,
    };
    return c.json(body, 400);
  }

  if (err instanceof InputError) {
    log.warn({ requestId, code: err.code, error: err.message }, 'Rejected request input');
    const body: ErrorResponse = {
      error: err.message,
      code: err.code,
      requestId,
    };
    return c.json(body, 400);
  }

  if (err instanceof HTTPException && err.status < 500) {
    log.warn({ requestId, status: err.status, error: err.message }, 'Request failed');
    const body: ErrorResponse = {
      error: err.message || 'Bad request',
      code: 'HTTP_ERROR',
      requestId,
    };
    return c.json(body, err.status);
  }

  log.error(
    {
      requestId,
      name: err.name,
      error: err.message,
      cause: err.cause instanceof Error ? err.cause.message : undefined,
    },
    'Server ran into an error',
  );
  const body: ErrorResponse = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
