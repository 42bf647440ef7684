import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { EventExtractionService } from '@snapcal/core/src/extraction/event-extraction-service.js';
import type { LastImageStore } from '@snapcal/core/src/cache/last-image-store.js';
import { DEFAULT_BODY_LIMIT_BYTES } from '@snapcal/core/src/config/env-config.js';
import { createChildLogger } from '@snapcal/shared/src/logger.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { bufferRequestBody, limitRequestBody } from './middleware/body-limit.js';
import { health } from './routes/health.js';
import { createIndexPageRoutes } from './routes/index-page.js';
import { createExtractionRoutes } from './routes/extraction.js';
import { createImageRoutes } from './routes/images.js';
import { buildOpenApiDocument } from './openapi.js';

const log = createChildLogger('api:server');

export interface AppDeps {
  readonly extractionService: EventExtractionService;
  readonly lastImageStore: LastImageStore;
  readonly bodyLimitBytes?: number;
}

export function createApp(deps: AppDeps): OpenAPIHono<AppEnv> {
  const app = createRouter();
  const maxSize = deps.bodyLimitBytes ?? DEFAULT_BODY_LIMIT_BYTES;

  app.use('*', cors());
  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  // Uploaded pictures exceed the usual default body sizes
  app.use('*', limitRequestBody(maxSize));
  app.use('*', bufferRequestBody);

  app.onError(errorHandler);

  app.route('/', createIndexPageRoutes());
  app.route('/health', health);

  app.get('/openapi.json', (c) => c.json(buildOpenApiDocument(app)));

  app.route('/', createExtractionRoutes(deps.extractionService));
  app.route('/image', createImageRoutes(deps.lastImageStore));

  return app;
}
