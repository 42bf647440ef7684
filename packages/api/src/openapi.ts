import type { OpenAPIHono } from '@hono/zod-openapi';
import type { AppEnv } from './types.js';
import { API_VERSION } from './routes/health.js';

export interface OpenApiServer {
  readonly url: string;
  readonly description?: string;
}

export function buildOpenApiDocument(
  app: OpenAPIHono<AppEnv>,
  servers: readonly OpenApiServer[] = [],
): ReturnType<OpenAPIHono<AppEnv>['getOpenAPI31Document']> {
  return app.getOpenAPI31Document({
    openapi: '3.1.0',
    info: {
      title: 'SnapCal API',
      version: API_VERSION,
      description: 'Turns event descriptions, web pages and pictures into iCalendar entries',
    },
    servers: servers.map((server) => ({ ...server })),
  });
}
