export type InputModality = 'image' | 'text';

export type ImageMimeType = 'image/jpeg' | 'image/png' | 'image/gif' | 'image/webp';

export interface TextPayload {
  readonly kind: 'text';
  readonly text: string;
}

export interface ImagePayload {
  readonly kind: 'image';
  readonly bytes: Uint8Array;
  readonly mimeType: ImageMimeType;
}

export type InputPayload = TextPayload | ImagePayload;

/**
 * What goes to the model: one text block, or an instruction followed by an
 * inlined image.
 */
export type ExtractionRequest =
  | {
      readonly kind: 'text';
      readonly prompt: string;
    }
  | {
      readonly kind: 'image';
      readonly instruction: string;
      readonly imageDataUri: string;
    };

export type CalendarValidation =
  | { readonly valid: true; readonly eventCount: number }
  | { readonly valid: false; readonly reason: string };

export interface ExtractionResult {
  readonly calendar: string;
  readonly modality: InputModality;
  readonly validation: CalendarValidation;
}

export interface CapturedImage {
  readonly bytes: Uint8Array;
  readonly mimeType: ImageMimeType;
}
