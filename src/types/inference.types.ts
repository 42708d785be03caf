/**
 * One event pulled from a provider response stream.
 *
 * `chunk` events carry the raw bytes of a partial `GenerationResult`;
 * everything else the provider sends in-band (metadata, modeled exceptions)
 * surfaces as a `control` event named after the provider's event member.
 */
export type StreamEvent =
  | { type: 'chunk'; bytes: Uint8Array | undefined }
  | { type: 'control'; name: string };

/**
 * An open streaming channel. Owned by a single consumer; calling `return()`
 * on its iterator releases the upstream connection.
 */
export type ChunkSource = AsyncIterable<StreamEvent>;

export type ControlFramePolicy = 'terminate' | 'skip';

export type StreamCloseReason =
  | 'end-of-stream'
  | 'control-frame'
  | 'decode-failure'
  | 'empty-result'
  | 'channel-failure'
  | 'cancelled';
