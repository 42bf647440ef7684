import { setTimeout as sleep } from 'node:timers/promises';
import puppeteer from 'puppeteer-core';
import type { CapturedImage } from '@snapcal/shared/src/types/extraction.types.js';
import { createChildLogger } from '@snapcal/shared/src/logger.js';
import { ConfigurationError, ScreenshotError, toError } from '@snapcal/shared/src/utils/errors.js';
import { verifyImage } from '../image/image-integrity.js';
import type { CaptureOptions, ScreenshotProvider } from './types.js';

const log = createChildLogger('screenshot:browser');

// Pages keep loading content after the body shows up
export const BROWSER_SETTLE_DELAY_MS = 3_000;
export const BROWSER_NAVIGATION_TIMEOUT_MS = 30_000;

const JPEG_QUALITY = 85;

export interface BrowserPage {
  goto(url: string, timeoutMs: number): Promise<void>;
  waitForVisibleBody(timeoutMs: number): Promise<void>;
  screenshotFullPage(): Promise<Uint8Array>;
  close(): Promise<void>;
}

export interface BrowserSession {
  newPage(): Promise<BrowserPage>;
  disconnect(): Promise<void>;
}

export type BrowserConnector = (endpoint: string) => Promise<BrowserSession>;

export interface BrowserScreenshotConfig {
  readonly endpoint?: string;
  readonly settleDelayMs?: number;
  readonly navigationTimeoutMs?: number;
  readonly connect?: BrowserConnector;
}

export const connectPuppeteer: BrowserConnector = async (endpoint) => {
  const browser = await puppeteer.connect({ browserWSEndpoint: endpoint });

  return {
    async newPage(): Promise<BrowserPage> {
      const page = await browser.newPage();
      return {
        async goto(url, timeoutMs) {
          await page.goto(url, { waitUntil: 'load', timeout: timeoutMs });
        },
        async waitForVisibleBody(timeoutMs) {
          await page.waitForSelector('body', { visible: true, timeout: timeoutMs });
        },
        async screenshotFullPage() {
          const data = await page.screenshot({ fullPage: true, type: 'jpeg', quality: JPEG_QUALITY });
          return new Uint8Array(data);
        },
        async close() {
          await page.close();
        },
      };
    },
    async disconnect() {
      await browser.disconnect();
    },
  };
};

/**
 * Runs `fn` inside a browser session that is always released, whether `fn`
 * resolves, throws, or the request is aborted.
 */
export async function withBrowserSession<T>(
  connect: BrowserConnector,
  endpoint: string,
  fn: (session: BrowserSession) => Promise<T>,
): Promise<T> {
  const session = await connect(endpoint);
  try {
    return await fn(session);
  } finally {
    await session.disconnect().catch((error: unknown) => {
      log.warn({ error: toError(error).message }, 'Failed to disconnect browser session');
    });
  }
}

export function createBrowserScreenshotProvider(config: BrowserScreenshotConfig): ScreenshotProvider {
  const { endpoint } = config;
  if (!endpoint) {
    throw new ConfigurationError(
      'BROWSER_WS_ENDPOINT environment variable is required for the browser screenshot provider',
    );
  }

  const connect = config.connect ?? connectPuppeteer;
  const settleDelayMs = config.settleDelayMs ?? BROWSER_SETTLE_DELAY_MS;
  const navigationTimeoutMs = config.navigationTimeoutMs ?? BROWSER_NAVIGATION_TIMEOUT_MS;

  log.info({ settleDelayMs, navigationTimeoutMs }, 'Using browser screenshot provider');

  return {
    name: 'browser',

    async capture(url: URL, options: CaptureOptions = {}): Promise<CapturedImage> {
      const { signal } = options;
      log.debug({ url: url.toString() }, 'Capturing screenshot in browser');

      let bytes: Uint8Array;
      try {
        signal?.throwIfAborted();
        bytes = await withBrowserSession(connect, endpoint, async (session) => {
          const page = await session.newPage();
          try {
            await page.goto(url.toString(), navigationTimeoutMs);
            signal?.throwIfAborted();
            await page.waitForVisibleBody(navigationTimeoutMs);
            await sleep(settleDelayMs, undefined, { signal });
            return await page.screenshotFullPage();
          } finally {
            await page.close().catch((error: unknown) => {
              log.warn({ error: toError(error).message }, 'Failed to close browser page');
            });
          }
        });
      } catch (error) {
        const cause = toError(error);
        throw new ScreenshotError(`Browser screenshot failed: ${cause.message}`, cause);
      }

      try {
        const image = await verifyImage(bytes, { accept: ['image/jpeg'] });
        log.debug({ url: url.toString(), size: bytes.length }, 'Screenshot captured');
        return image;
      } catch (error) {
        const cause = toError(error);
        throw new ScreenshotError(`Screenshot is not a valid JPEG: ${cause.message}`, cause);
      }
    },
  };
}
