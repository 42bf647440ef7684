import type { ExtractionResult, InputPayload } from '@snapcal/shared/src/types/extraction.types.js';
import { createChildLogger } from '@snapcal/shared/src/logger.js';
import { classifyInput } from '../input/input-classifier.js';
import { verifyImage } from '../image/image-integrity.js';
import type { CalendarLlmClient } from '../llm/llm-client.js';
import { buildExtractionRequest } from '../llm/extraction-request.js';
import type { ScreenshotProvider } from '../screenshot/types.js';
import type { LastImageStore } from '../cache/last-image-store.js';
import { validateCalendar } from '../validation/calendar-validator.js';

const log = createChildLogger('core:extraction');

export interface EventExtractionDeps {
  readonly llmClient: CalendarLlmClient;
  readonly screenshotProvider: ScreenshotProvider;
  readonly lastImageStore: LastImageStore;
  readonly clock?: () => Date;
}

export interface ExtractOptions {
  readonly signal?: AbortSignal;
}

export interface EventExtractionService {
  /** Free text or a page URL, as typed into the form. */
  extractFromText(raw: string, options?: ExtractOptions): Promise<ExtractionResult>;
  /** An uploaded picture of the event. */
  extractFromImage(bytes: Uint8Array, options?: ExtractOptions): Promise<ExtractionResult>;
}

export function createEventExtractionService(deps: EventExtractionDeps): EventExtractionService {
  const { llmClient, screenshotProvider, lastImageStore } = deps;
  const clock = deps.clock ?? ((): Date => new Date());

  async function extract(payload: InputPayload, options: ExtractOptions): Promise<ExtractionResult> {
    const request = buildExtractionRequest(payload, clock());
    const calendar = await llmClient.complete(request, { signal: options.signal });
    const validation = validateCalendar(calendar);

    log.debug({ modality: payload.kind, valid: validation.valid }, 'Extraction completed');

    return { calendar, modality: payload.kind, validation };
  }

  return {
    async extractFromText(raw: string, options: ExtractOptions = {}): Promise<ExtractionResult> {
      const input = classifyInput(raw);

      switch (input.kind) {
        case 'url': {
          log.debug({ url: input.url.toString(), provider: screenshotProvider.name }, 'Text input is URL');
          const image = await screenshotProvider.capture(input.url, { signal: options.signal });
          lastImageStore.set(image);
          return extract({ kind: 'image', bytes: image.bytes, mimeType: image.mimeType }, options);
        }
        case 'text':
          log.debug({ length: input.text.length }, 'Text input is raw text');
          return extract({ kind: 'text', text: input.text }, options);
      }
    },

    async extractFromImage(bytes: Uint8Array, options: ExtractOptions = {}): Promise<ExtractionResult> {
      const image = await verifyImage(bytes);
      log.debug({ mimeType: image.mimeType, size: bytes.length }, 'Image input accepted');
      return extract({ kind: 'image', bytes: image.bytes, mimeType: image.mimeType }, options);
    },
  };
}
