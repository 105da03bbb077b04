export type RingBufferErrorCode = 'invalid_argument' | 'invalid_operation';

export type RingBufferErrorDetails = Record<string, number | string | boolean>;

/** Thrown for misuse of a buffer: bad sizes or reads past what is available. */
export class RingBufferError extends Error {
  readonly code: RingBufferErrorCode;
  readonly details?: RingBufferErrorDetails;

  constructor(message: string, code: RingBufferErrorCode, details?: RingBufferErrorDetails) {
    super(message);
    this.name = 'RingBufferError';
    this.code = code;
    this.details = details;
  }
}

export class InvalidArgumentError extends RingBufferError {
  constructor(message: string, details?: RingBufferErrorDetails) {
    super(message, 'invalid_argument', details);
    this.name = 'InvalidArgumentError';
  }
}

export class InvalidOperationError extends RingBufferError {
  constructor(message: string, details?: RingBufferErrorDetails) {
    super(message, 'invalid_operation', details);
    this.name = 'InvalidOperationError';
  }
}
