import { createRoute, z } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { LastImageStore } from '@snapcal/core/src/cache/last-image-store.js';
import { createRouter, type AppEnv } from '../types.js';
import { ErrorResponseSchema } from '../schemas/responses.js';

const lastImageRoute = createRoute({
  method: 'get',
  path: '/last',
  tags: ['Diagnostics'],
  summary: 'Last captured page screenshot',
  responses: {
    200: {
      description: 'Screenshot bytes',
      content: {
        'image/jpeg': {
          schema: z.string().openapi({ format: 'binary' }),
        },
      },
    },
    404: {
      description: 'No screenshot has been captured yet',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

export function createImageRoutes(lastImageStore: LastImageStore): OpenAPIHono<AppEnv> {
  const images = createRouter();

  images.openapi(lastImageRoute, (c) => {
    const image = lastImageStore.get();
    if (!image) {
      return c.json(
        {
          error: 'No image available',
          code: 'NO_IMAGE',
          requestId: c.get('requestId'),
        },
        404,
      );
    }

    return new Response(image.bytes, {
      status: 200,
      headers: {
        'Content-Type': image.mimeType,
        'Content-Length': String(image.bytes.length),
        'Cache-Control': 'no-store',
        'Last-Modified': image.capturedAt.toUTCString(),
      },
    });
  });

  return images;
}
