import type { OpenAPIHono } from '@hono/zod-openapi';
import type { CalendarLlmClient } from '@snapcal/core/src/llm/llm-client.js';
import type { ScreenshotProvider } from '@snapcal/core/src/screenshot/types.js';
import { createLastImageStore, type LastImageStore } from '@snapcal/core/src/cache/last-image-store.js';
import { createEventExtractionService } from '@snapcal/core/src/extraction/event-extraction-service.js';
import type { AppEnv } from './types.js';
import { createApp } from './app.js';

export interface TestAppDeps {
  readonly llmClient: CalendarLlmClient;
  readonly screenshotProvider: ScreenshotProvider;
  readonly lastImageStore?: LastImageStore;
  readonly now?: Date;
  readonly bodyLimitBytes?: number;
}

/**
 * Wires the real extraction service to fakes for the two upstream services.
 * For use in unit tests only.
 */
export function createTestApp(deps: TestAppDeps): {
  app: OpenAPIHono<AppEnv>;
  lastImageStore: LastImageStore;
} {
  const lastImageStore = deps.lastImageStore ?? createLastImageStore();
  const now = deps.now;
  const extractionService = createEventExtractionService({
    llmClient: deps.llmClient,
    screenshotProvider: deps.screenshotProvider,
    lastImageStore,
    clock: now ? (): Date => now : undefined,
  });

  const app = createApp({
    extractionService,
    lastImageStore,
    bodyLimitBytes: deps.bodyLimitBytes,
  });

  return { app, lastImageStore };
}
