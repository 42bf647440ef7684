import type { CapturedImage, ImageMimeType } from '@snapcal/shared/src/types/extraction.types.js';

export interface StoredImage {
  readonly bytes: Uint8Array;
  readonly mimeType: ImageMimeType;
  readonly capturedAt: Date;
}

/**
 * Process-wide single slot for the most recent screenshot. Empty at start,
 * replaced on every successful capture, never evicted.
 *
 * A write copies the bytes and swaps one frozen snapshot, so a reader holds
 * either the previous image or the new one and never a mix of both.
 */
export interface LastImageStore {
  get(): StoredImage | undefined;
  set(image: CapturedImage, capturedAt?: Date): StoredImage;
}

export function createLastImageStore(): LastImageStore {
  let current: StoredImage | undefined;

  return {
    get(): StoredImage | undefined {
      return current;
    },

    set(image: CapturedImage, capturedAt: Date = new Date()): StoredImage {
      const snapshot: StoredImage = Object.freeze({
        bytes: Uint8Array.from(image.bytes),
        mimeType: image.mimeType,
        capturedAt: new Date(capturedAt.getTime()),
      });
      current = snapshot;
      return snapshot;
    },
  };
}
