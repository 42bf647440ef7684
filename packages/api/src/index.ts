import { serve } from '@hono/node-server';
import { loadEnvConfig } from '@snapcal/core/src/config/env-config.js';
import { createLlmClient } from '@snapcal/core/src/llm/llm-client.js';
import { createScreenshotProvider } from '@snapcal/core/src/screenshot/screenshot-provider.js';
import { createLastImageStore } from '@snapcal/core/src/cache/last-image-store.js';
import { createEventExtractionService } from '@snapcal/core/src/extraction/event-extraction-service.js';
import { createChildLogger } from '@snapcal/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

function main(): void {
  const config = loadEnvConfig();

  const lastImageStore = createLastImageStore();
  const extractionService = createEventExtractionService({
    llmClient: createLlmClient(config.llm),
    screenshotProvider: createScreenshotProvider(config.screenshot),
    lastImageStore,
  });

  const app = createApp({
    extractionService,
    lastImageStore,
    bodyLimitBytes: config.server.bodyLimitBytes,
  });

  const { hostname, port } = config.server;
  log.info({ hostname, port, screenshotProvider: config.screenshot.kind }, 'Starting SnapCal API server');

  const server = serve({ fetch: app.fetch, hostname, port }, (info) => {
    log.info({ address: info.address, port: info.port }, 'SnapCal API server running');
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    log.info({ signal }, 'Shutting down');
    server.close((error?: Error) => {
      if (error) {
        log.error({ error: error.message }, 'Error while closing server');
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

try {
  main();
} catch (error: unknown) {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
}
