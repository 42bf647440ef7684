import { createApp } from '../packages/api/src/app.js';
import { buildOpenApiDocument } from '../packages/api/src/openapi.js';
import { createLastImageStore } from '../packages/core/src/cache/last-image-store.js';
import { createEventExtractionService } from '../packages/core/src/extraction/event-extraction-service.js';
import { createLlmClient } from '../packages/core/src/llm/llm-client.js';

const lastImageStore = createLastImageStore();

const app = createApp({
  extractionService: createEventExtractionService({
    llmClient: createLlmClient({ mock: true }),
    screenshotProvider: {
      name: 'unused',
      capture: () => Promise.reject(new Error('Screenshots are not taken while generating the OpenAPI document')),
    },
    lastImageStore,
  }),
  lastImageStore,
});

const doc = buildOpenApiDocument(app, [
  { url: 'http://localhost:3000', description: 'Local development' },
]);

process.stdout.write(JSON.stringify(doc, null, 2));
process.stdout.write('\n');
