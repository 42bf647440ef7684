import { ChatOpenAI } from '@langchain/openai';
import { HumanMessage, type MessageContent } from '@langchain/core/messages';
import type { ExtractionRequest } from '@snapcal/shared/src/types/extraction.types.js';
import { createChildLogger } from '@snapcal/shared/src/logger.js';
import { ConfigurationError, LlmError, toError } from '@snapcal/shared/src/utils/errors.js';
import { describeExtractionRequest } from './extraction-request.js';

const log = createChildLogger('llm:client');

export const DEFAULT_LLM_MODEL = 'gpt-4o';
export const DEFAULT_LLM_TIMEOUT_MS = 60_000;

export interface LlmInvokeOptions {
  readonly signal?: AbortSignal;
}

export interface CalendarLlmClient {
  complete(request: ExtractionRequest, options?: LlmInvokeOptions): Promise<string>;
}

export interface LlmClientConfig {
  readonly mock: boolean;
  readonly apiKey?: string;
  readonly model?: string;
  readonly timeoutMs?: number;
}

const MOCK_CALENDAR = [
  'BEGIN:VCALENDAR',
  'VERSION:2.0',
  'PRODID:-//snapcal//mock//EN',
  'BEGIN:VEVENT',
  'UID:mock-event@snapcal',
  'DTSTAMP:20240101T000000Z',
  'DTSTART;TZID=Europe/Berlin:20240101T190000',
  'DTEND;TZID=Europe/Berlin:20240101T200000',
  'SUMMARY:Mock event',
  'END:VEVENT',
  'END:VCALENDAR',
].join('\r\n');

function createMockClient(): CalendarLlmClient {
  log.info('Using mock LLM client');

  return {
    complete(request: ExtractionRequest): Promise<string> {
      log.debug(describeExtractionRequest(request), 'Mock LLM invocation');
      return Promise.resolve(MOCK_CALENDAR);
    },
  };
}

export function toMessageContent(request: ExtractionRequest): MessageContent {
  switch (request.kind) {
    case 'text':
      return request.prompt;
    case 'image':
      return [
        { type: 'text', text: request.instruction },
        { type: 'image_url', image_url: { url: request.imageDataUri } },
      ];
  }
}

/**
 * Flattens a chat response into plain text. Multi-part answers keep only
 * their text parts.
 */
export function readMessageText(content: MessageContent): string {
  if (typeof content === 'string') {
    return content;
  }

  return content
    .map((part) => ('text' in part && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

function createOpenAiClient(config: LlmClientConfig): CalendarLlmClient {
  if (!config.apiKey) {
    throw new ConfigurationError('OPENAI_KEY environment variable is required for the OpenAI LLM client');
  }

  const modelName = config.model ?? DEFAULT_LLM_MODEL;
  const timeoutMs = config.timeoutMs ?? DEFAULT_LLM_TIMEOUT_MS;

  const model = new ChatOpenAI({
    model: modelName,
    apiKey: config.apiKey,
    temperature: 0,
    maxRetries: 0,
    timeout: timeoutMs,
  });

  log.info({ model: modelName, timeoutMs }, 'Using OpenAI LLM client');

  return {
    async complete(request: ExtractionRequest, options: LlmInvokeOptions = {}): Promise<string> {
      log.debug(describeExtractionRequest(request), 'OpenAI LLM invocation');

      let content: MessageContent;
      try {
        const response = await model.invoke(
          [new HumanMessage({ content: toMessageContent(request) })],
          { signal: options.signal },
        );
        content = response.content;
      } catch (error) {
        const cause = toError(error);
        throw new LlmError(`OpenAI invocation failed: ${cause.message}`, 'upstream', cause);
      }

      const text = readMessageText(content);
      if (text.trim().length === 0) {
        throw new LlmError('No response content', 'no_content');
      }

      log.debug({ contentLength: text.length }, 'OpenAI LLM response received');
      return text;
    },
  };
}

export function createLlmClient(config: LlmClientConfig): CalendarLlmClient {
  if (config.mock) {
    return createMockClient();
  }

  return createOpenAiClient(config);
}
