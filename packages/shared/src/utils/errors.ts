export class SnapcalError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'SnapcalError';
  }
}

/**
 * Raised for anything the caller got wrong. The API answers these with 400.
 */
export class InputError extends SnapcalError {
  constructor(message: string, code = 'INPUT_ERROR', cause?: Error) {
    super(message, code, cause);
    this.name = 'InputError';
  }
}

export class InvalidImageError extends InputError {
  constructor(message: string, cause?: Error) {
    super(message, 'INVALID_IMAGE', cause);
    this.name = 'InvalidImageError';
  }
}

export class ScreenshotError extends SnapcalError {
  constructor(message: string, cause?: Error) {
    super(message, 'SCREENSHOT_ERROR', cause);
    this.name = 'ScreenshotError';
  }
}

export type LlmFailureReason = 'upstream' | 'no_content';

export class LlmError extends SnapcalError {
  constructor(
    message: string,
    public readonly reason: LlmFailureReason,
    cause?: Error,
  ) {
    super(message, 'LLM_ERROR', cause);
    this.name = 'LlmError';
  }
}

export class ConfigurationError extends SnapcalError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
