import type { CapturedImage } from '@snapcal/shared/src/types/extraction.types.js';
import { createChildLogger } from '@snapcal/shared/src/logger.js';
import { ConfigurationError, ScreenshotError, toError } from '@snapcal/shared/src/utils/errors.js';
import { verifyImage } from '../image/image-integrity.js';
import type { CaptureOptions, ScreenshotProvider } from './types.js';

const log = createChildLogger('screenshot:apiflash');

export const APIFLASH_ENDPOINT = 'https://api.apiflash.com/v1/urltoimage';

// Some pages are really slow; the renderer waits this long before capturing
export const APIFLASH_DELAY_SECONDS = 10;

export const DEFAULT_SCREENSHOT_TIMEOUT_MS = 60_000;

export interface ApiflashConfig {
  readonly accessKey?: string;
  readonly timeoutMs?: number;
  readonly endpoint?: string;
}

export function buildApiflashUrl(endpoint: string, accessKey: string, target: URL): URL {
  const requestUrl = new URL(endpoint);
  requestUrl.searchParams.set('access_key', accessKey);
  requestUrl.searchParams.set('url', target.toString());
  requestUrl.searchParams.set('delay', String(APIFLASH_DELAY_SECONDS));
  requestUrl.searchParams.set('format', 'jpeg');
  requestUrl.searchParams.set('full_page', 'true');
  return requestUrl;
}

function combineSignals(timeoutMs: number, signal?: AbortSignal): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([timeout, signal]) : timeout;
}

export function createApiflashScreenshotProvider(config: ApiflashConfig): ScreenshotProvider {
  const { accessKey } = config;
  if (!accessKey) {
    throw new ConfigurationError(
      'APIFLASH_KEY environment variable is required for the apiflash screenshot provider',
    );
  }

  const endpoint = config.endpoint ?? APIFLASH_ENDPOINT;
  const timeoutMs = config.timeoutMs ?? DEFAULT_SCREENSHOT_TIMEOUT_MS;

  log.info({ endpoint, timeoutMs }, 'Using apiflash screenshot provider');

  return {
    name: 'apiflash',

    async capture(url: URL, options: CaptureOptions = {}): Promise<CapturedImage> {
      log.debug({ url: url.toString() }, 'Requesting screenshot');

      let bytes: Uint8Array;
      try {
        const response = await fetch(buildApiflashUrl(endpoint, accessKey, url), {
          signal: combineSignals(timeoutMs, options.signal),
        });

        if (!response.ok) {
          throw new Error(`apiflash responded with status ${String(response.status)}`);
        }

        bytes = new Uint8Array(await response.arrayBuffer());
      } catch (error) {
        const cause = toError(error);
        throw new ScreenshotError(`Screenshot request failed: ${cause.message}`, cause);
      }

      try {
        const image = await verifyImage(bytes, { accept: ['image/jpeg'] });
        log.debug({ url: url.toString(), size: bytes.length }, 'Screenshot received');
        return image;
      } catch (error) {
        const cause = toError(error);
        throw new ScreenshotError(`Screenshot is not a valid JPEG: ${cause.message}`, cause);
      }
    },
  };
}
