export type SafetensorsErrorCode =
  | 'OPEN_FAILED'
  | 'TRUNCATED_HEADER_LENGTH'
  | 'HEADER_TOO_LARGE'
  | 'TRUNCATED_HEADER'
  | 'MALFORMED_HEADER'
  | 'INVALID_TENSOR_DESCRIPTOR'
  | 'INVALID_SHAPE';

export interface SafetensorsErrorOptions {
  cause?: unknown;
  tensorName?: string;
}

/**
 * Every expected failure while reading a safetensors header. The CLI prints
 * the message and exits non-zero; anything else is treated as a crash.
 */
export class SafetensorsError extends Error {
  public readonly code: SafetensorsErrorCode;
  public readonly tensorName?: string;

  constructor(code: SafetensorsErrorCode, message: string, options: SafetensorsErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'SafetensorsError';
    this.code = code;
    this.tensorName = options.tensorName;
  }
}

export function isSafetensorsError(error: unknown): error is SafetensorsError {
  return error instanceof SafetensorsError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
