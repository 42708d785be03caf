import { RelayError } from './base.js';

export class ChannelError extends RelayError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    cause?: unknown,
  ) {
    super(message, 'CHANNEL_ERROR', cause);
  }
}
