import type { ExtractionRequest, ImageMimeType, InputPayload } from '@snapcal/shared/src/types/extraction.types.js';
import { buildImageInstruction, buildTextPrompt } from '../prompt/extraction-prompt.js';

export function toImageDataUri(bytes: Uint8Array, mimeType: ImageMimeType): string {
  return `data:${mimeType};base64,${Buffer.from(bytes).toString('base64')}`;
}

export function buildExtractionRequest(payload: InputPayload, now: Date): ExtractionRequest {
  switch (payload.kind) {
    case 'text':
      return { kind: 'text', prompt: buildTextPrompt(payload.text, now) };
    case 'image':
      return {
        kind: 'image',
        instruction: buildImageInstruction(now),
        imageDataUri: toImageDataUri(payload.bytes, payload.mimeType),
      };
  }
}

/**
 * Short form of a request for logs. Image data is reduced to its length.
 */
export function describeExtractionRequest(request: ExtractionRequest): Record<string, unknown> {
  switch (request.kind) {
    case 'text':
      return { kind: request.kind, promptLength: request.prompt.length };
    case 'image':
      return {
        kind: request.kind,
        instructionLength: request.instruction.length,
        dataUriLength: request.imageDataUri.length,
      };
  }
}
