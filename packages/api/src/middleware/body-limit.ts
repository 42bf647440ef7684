import type { Context, MiddlewareHandler } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { createMiddleware } from 'hono/factory';
import type { AppEnv } from '../types.js';

export function payloadTooLarge(c: Context<AppEnv>): Response {
  return c.json(
    {
      error: 'Request body too large',
      code: 'PAYLOAD_TOO_LARGE',
      requestId: c.get('requestId'),
    },
    413,
  );
}

export function isBodyLimitError(error: unknown): boolean {
  let current: unknown = error;
  while (current instanceof Error) {
    if (current.name === 'BodyLimitError') {
      return true;
    }
    current = current.cause;
  }
  return false;
}

export function limitRequestBody(maxSize: number): MiddlewareHandler {
  return bodyLimit({ maxSize, onError: payloadTooLarge });
}

/**
 * Reads a body without a declared Content-Length in full, so that an
 * oversized stream fails with 413 here, before a route or validator starts
 * parsing it. Mount after `limitRequestBody`.
 */
export const bufferRequestBody = createMiddleware<AppEnv>(async (c, next) => {
  if (c.req.raw.body) {
    try {
      await c.req.arrayBuffer();
    } catch (error) {
      if (isBodyLimitError(error)) {
        return payloadTooLarge(c);
      }
      throw error;
    }
  }
  await next();
});
