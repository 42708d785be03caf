export { RelayError } from './base.js';
export { EncodingError, DecodingError, EmptyResultError } from './codec.js';
export { ChannelError } from './backend.js';
