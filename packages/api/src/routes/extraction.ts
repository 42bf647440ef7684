import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { Context } from 'hono';
import type { EventExtractionService } from '@snapcal/core/src/extraction/event-extraction-service.js';
import { InputError, toError } from '@snapcal/shared/src/utils/errors.js';
import { createChildLogger } from '@snapcal/shared/src/logger.js';
import { createRouter, type AppEnv } from '../types.js';
import { TextFormSchema } from '../schemas/requests.js';
import { CalendarResponseSchema, ErrorResponseSchema } from '../schemas/responses.js';

const log = createChildLogger('api:extraction');

export const CALENDAR_CONTENT_TYPE = 'text/calendar; charset=utf-8';

const errorResponse = (description: string) => ({
  description,
  content: {
    'application/json': {
      schema: ErrorResponseSchema,
    },
  },
});

const calendarResponse = {
  description: 'Calendar entry for the event',
  content: {
    'text/calendar': {
      schema: CalendarResponseSchema,
    },
  },
};

const extractTextRoute = createRoute({
  method: 'post',
  path: '/text',
  tags: ['Extraction'],
  summary: 'Create a calendar entry from text or from a page URL',
  description:
    'A value that parses as an absolute URL is rendered to an image first; anything else is sent to the model as text.',
  request: {
    body: {
      required: true,
      content: {
        'application/x-www-form-urlencoded': {
          schema: TextFormSchema,
        },
      },
    },
  },
  responses: {
    200: calendarResponse,
    400: errorResponse('Missing or empty text'),
    500: errorResponse('Screenshot or language model failure'),
  },
});

const extractImageRoute = createRoute({
  method: 'post',
  path: '/image',
  tags: ['Extraction'],
  summary: 'Create a calendar entry from a picture of an event',
  description: 'Multipart upload with a single file part. Only the first file part is read.',
  responses: {
    200: calendarResponse,
    400: errorResponse('No image in the request, or the image is unreadable'),
    500: errorResponse('Language model failure'),
  },
});

interface UploadedFile {
  readonly name: string;
  readonly size: number;
  arrayBuffer(): Promise<ArrayBuffer>;
}

async function readFirstFile(c: Context<AppEnv>): Promise<UploadedFile | undefined> {
  let form: FormData;
  try {
    // The body is already buffered by the body limit middleware
    const body = await c.req.arrayBuffer();
    form = await new Response(body, {
      headers: { 'Content-Type': c.req.header('Content-Type') ?? '' },
    }).formData();
  } catch (error) {
    throw new InputError('Failed to read image file', 'NO_IMAGE', toError(error));
  }

  for (const value of form.values()) {
    if (typeof value !== 'string') {
      return value;
    }
  }
  return undefined;
}

export function createExtractionRoutes(
  extractionService: EventExtractionService,
): OpenAPIHono<AppEnv> {
  const extraction = createRouter();

  extraction.openapi(extractTextRoute, async (c) => {
    const { text } = c.req.valid('form');
    log.debug({ requestId: c.get('requestId'), length: text.length }, 'Handling text input');

    const result = await extractionService.extractFromText(text, { signal: c.req.raw.signal });

    return c.body(result.calendar, 200, { 'Content-Type': CALENDAR_CONTENT_TYPE });
  });

  extraction.openapi(extractImageRoute, async (c) => {
    const file = await readFirstFile(c);
    if (!file) {
      throw new InputError('No image found in request', 'NO_IMAGE');
    }

    log.debug(
      { requestId: c.get('requestId'), name: file.name, size: file.size },
      'Handling image input',
    );

    const bytes = new Uint8Array(await file.arrayBuffer());
    const result = await extractionService.extractFromImage(bytes, { signal: c.req.raw.signal });

    return c.body(result.calendar, 200, { 'Content-Type': CALENDAR_CONTENT_TYPE });
  });

  return extraction;
}
