import jpeg from 'jpeg-js';

export function createTestJpeg(width = 4, height = 4): Uint8Array {
  const data = Buffer.alloc(width * height * 4, 0x80);
  return new Uint8Array(jpeg.encode({ data, width, height }, 90).data);
}

/** PNG signature, an IHDR length and then no valid chunk at all. */
export function createCorruptPng(): Uint8Array {
  return new Uint8Array([
    0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a,
    0, 0, 0, 13,
    ...Buffer.from('garbage garbage garbage garbage ', 'ascii'),
  ]);
}

export function createCorruptJpeg(): Uint8Array {
  return new Uint8Array([0xff, 0xd8, 0xff, ...Buffer.from('not really a jpeg', 'ascii')]);
}

/**
 * Rewrites the frame header of a JPEG so that it claims other dimensions.
 * The scan data still describes the original, smaller image.
 */
export function withClaimedDimensions(jpegBytes: Uint8Array, width: number, height: number): Uint8Array {
  const patched = Uint8Array.from(jpegBytes);
  // Segments after SOI: 0xFF, marker, 16-bit length (excluding the marker)
  let offset = 2;
  while (offset + 8 < patched.length) {
    const marker = patched[offset + 1];
    if (marker === 0xc0 || marker === 0xc1 || marker === 0xc2) {
      patched[offset + 5] = height >> 8;
      patched[offset + 6] = height & 0xff;
      patched[offset + 7] = width >> 8;
      patched[offset + 8] = width & 0xff;
      return patched;
    }
    offset += 2 + ((patched[offset + 2] << 8) | patched[offset + 3]);
  }
  throw new Error('JPEG has no frame header');
}
