import { z } from 'zod';
import { ConfigurationError } from '@snapcal/shared/src/utils/errors.js';
import { DEFAULT_LLM_MODEL, DEFAULT_LLM_TIMEOUT_MS, type LlmClientConfig } from '../llm/llm-client.js';
import { DEFAULT_SCREENSHOT_TIMEOUT_MS } from '../screenshot/apiflash-screenshot-provider.js';
import type { ScreenshotProviderConfig } from '../screenshot/screenshot-provider.js';

export const DEFAULT_ADDR = '0.0.0.0:3000';
export const DEFAULT_BODY_LIMIT_BYTES = 10_000_000;

const emptyAsUnset = (value: unknown): unknown => (value === '' ? undefined : value);

const optionalString = z.preprocess(emptyAsUnset, z.string().min(1).optional());

const positiveInt = (fallback: number) =>
  z.preprocess(emptyAsUnset, z.coerce.number().int().positive().default(fallback));

const EnvSchema = z.object({
  SNAPCAL_MOCK_LLM: z.preprocess(emptyAsUnset, z.enum(['true', 'false']).default('false')),
  OPENAI_KEY: optionalString,
  OPENAI_MODEL: z.preprocess(emptyAsUnset, z.string().min(1).default(DEFAULT_LLM_MODEL)),
  LLM_TIMEOUT_MS: positiveInt(DEFAULT_LLM_TIMEOUT_MS),
  SCREENSHOT_PROVIDER: z.preprocess(emptyAsUnset, z.enum(['apiflash', 'browser']).default('apiflash')),
  APIFLASH_KEY: optionalString,
  SCREENSHOT_TIMEOUT_MS: positiveInt(DEFAULT_SCREENSHOT_TIMEOUT_MS),
  BROWSER_WS_ENDPOINT: optionalString,
  ADDR: z.preprocess(emptyAsUnset, z.string().default(DEFAULT_ADDR)),
  BODY_LIMIT_BYTES: positiveInt(DEFAULT_BODY_LIMIT_BYTES),
});

export interface ServerConfig {
  readonly hostname: string;
  readonly port: number;
  readonly bodyLimitBytes: number;
}

export interface AppConfig {
  readonly server: ServerConfig;
  readonly llm: LlmClientConfig;
  readonly screenshot: ScreenshotProviderConfig;
}

export function parseBindAddress(addr: string): { hostname: string; port: number } {
  const separator = addr.lastIndexOf(':');
  if (separator <= 0) {
    throw new ConfigurationError(`ADDR must look like host:port, got "${addr}"`);
  }

  const hostname = addr.slice(0, separator).replace(/^\[(.*)\]$/, '$1');
  const portText = addr.slice(separator + 1);
  const port = Number(portText);

  if (!/^\d+$/.test(portText) || port > 65535) {
    throw new ConfigurationError(`ADDR has an invalid port: "${portText}"`);
  }

  return { hostname, port };
}

/**
 * Reads the service configuration from the environment. Called once at
 * startup; anything missing or malformed stops the process.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
    throw new ConfigurationError(`Invalid environment: ${details.join('; ')}`);
  }

  const values = parsed.data;
  const mock = values.SNAPCAL_MOCK_LLM === 'true';

  if (!mock && !values.OPENAI_KEY) {
    throw new ConfigurationError('OPENAI_KEY environment variable is required');
  }

  let screenshot: ScreenshotProviderConfig;
  if (values.SCREENSHOT_PROVIDER === 'browser') {
    if (!values.BROWSER_WS_ENDPOINT) {
      throw new ConfigurationError(
        'BROWSER_WS_ENDPOINT environment variable is required when SCREENSHOT_PROVIDER is browser',
      );
    }
    screenshot = { kind: 'browser', endpoint: values.BROWSER_WS_ENDPOINT };
  } else {
    if (!values.APIFLASH_KEY) {
      throw new ConfigurationError('APIFLASH_KEY environment variable is required');
    }
    screenshot = {
      kind: 'apiflash',
      accessKey: values.APIFLASH_KEY,
      timeoutMs: values.SCREENSHOT_TIMEOUT_MS,
    };
  }

  return {
    server: { ...parseBindAddress(values.ADDR), bodyLimitBytes: values.BODY_LIMIT_BYTES },
    llm: {
      mock,
      apiKey: values.OPENAI_KEY,
      model: values.OPENAI_MODEL,
      timeoutMs: values.LLM_TIMEOUT_MS,
    },
    screenshot,
  };
}
