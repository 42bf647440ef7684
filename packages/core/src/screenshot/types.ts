import type { CapturedImage } from '@snapcal/shared/src/types/extraction.types.js';

export interface CaptureOptions {
  readonly signal?: AbortSignal;
}

export interface ScreenshotProvider {
  readonly name: string;
  capture(url: URL, options?: CaptureOptions): Promise<CapturedImage>;
}
