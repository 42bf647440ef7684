import { fileTypeFromBuffer } from 'file-type';
import sharp from 'sharp';
import type { CapturedImage, ImageMimeType } from '@snapcal/shared/src/types/extraction.types.js';
import { createChildLogger } from '@snapcal/shared/src/logger.js';
import { InvalidImageError, toError } from '@snapcal/shared/src/utils/errors.js';

const log = createChildLogger('core:image-integrity');

export const SUPPORTED_IMAGE_TYPES: readonly ImageMimeType[] = [
  'image/jpeg',
  'image/png',
  'image/gif',
  'image/webp',
];

// Full-page screenshots of long pages get tall, e.g. 1920x30000
export const MAX_IMAGE_SIDE_PX = 32_768;
export const MAX_IMAGE_PIXELS = 60_000_000;

export interface VerifyImageOptions {
  readonly accept?: readonly ImageMimeType[];
}

function asImageMimeType(mime: string): ImageMimeType | undefined {
  return SUPPORTED_IMAGE_TYPES.find((supported) => supported === mime);
}

async function readDimensions(input: Buffer): Promise<{ width: number; height: number }> {
  let width: number | undefined;
  let height: number | undefined;
  try {
    ({ width, height } = await sharp(input).metadata());
  } catch (error) {
    throw new InvalidImageError('Image could not be decoded', toError(error));
  }

  if (!width || !height) {
    throw new InvalidImageError('Image could not be decoded');
  }
  return { width, height };
}

/**
 * Decodes every pixel off the event loop. The header is checked first so
 * that a few bytes claiming a huge canvas are turned away before any
 * pixel memory is allocated.
 */
async function decodeImage(bytes: Uint8Array): Promise<void> {
  const input = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const { width, height } = await readDimensions(input);

  if (width > MAX_IMAGE_SIDE_PX || height > MAX_IMAGE_SIDE_PX || width * height > MAX_IMAGE_PIXELS) {
    log.warn({ width, height }, 'Rejected oversized image');
    throw new InvalidImageError(`Image dimensions ${String(width)}x${String(height)} exceed the limit`);
  }

  try {
    await sharp(input, { limitInputPixels: MAX_IMAGE_PIXELS, failOn: 'warning' }).stats();
  } catch (error) {
    throw new InvalidImageError('Image could not be decoded', toError(error));
  }
  log.debug({ width, height }, 'Image decoded');
}

/**
 * Checks that the bytes are an image we can forward to the model. The type
 * is taken from the content, never from a filename or header, and the
 * image is decoded in full, so truncated or corrupt files are caught as well.
 */
export async function verifyImage(
  bytes: Uint8Array,
  options: VerifyImageOptions = {},
): Promise<CapturedImage> {
  const accept = options.accept ?? SUPPORTED_IMAGE_TYPES;

  if (bytes.length === 0) {
    throw new InvalidImageError('Image is empty');
  }

  const detected = await fileTypeFromBuffer(bytes);
  const mimeType = detected ? asImageMimeType(detected.mime) : undefined;

  if (!mimeType || !accept.includes(mimeType)) {
    log.warn({ detected: detected?.mime, size: bytes.length }, 'Rejected image payload');
    throw new InvalidImageError(
      `Unsupported image type: ${detected?.mime ?? 'unknown'}`,
    );
  }

  await decodeImage(bytes);

  return { bytes, mimeType };
}
