import { createApiflashScreenshotProvider } from './apiflash-screenshot-provider.js';
import { createBrowserScreenshotProvider } from './browser-screenshot-provider.js';
import type { ScreenshotProvider } from './types.js';

export type ScreenshotProviderConfig =
  | {
      readonly kind: 'apiflash';
      readonly accessKey?: string;
      readonly timeoutMs?: number;
    }
  | {
      readonly kind: 'browser';
      readonly endpoint?: string;
    };

export function createScreenshotProvider(config: ScreenshotProviderConfig): ScreenshotProvider {
  switch (config.kind) {
    case 'apiflash':
      return createApiflashScreenshotProvider({
        accessKey: config.accessKey,
        timeoutMs: config.timeoutMs,
      });
    case 'browser':
      return createBrowserScreenshotProvider({ endpoint: config.endpoint });
  }
}
