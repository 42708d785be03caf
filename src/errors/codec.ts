import { RelayError } from './base.js';

/** The prompt could not be serialized into a Titan request body. */
export class EncodingError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(message, 'ENCODING_ERROR', cause);
  }
}

/** Provider bytes did not match the Titan response schema. */
export class DecodingError extends RelayError {
  constructor(message: string, cause?: unknown) {
    super(message, 'DECODING_ERROR', cause);
  }
}

export class EmptyResultError extends RelayError {
  constructor(message = 'Provider returned no candidates') {
    super(message, 'EMPTY_RESULT');
  }
}
