import type { FastifyBaseLogger } from 'fastify';
import type {
  ChunkSource,
  ControlFramePolicy,
  StreamCloseReason,
  StreamEvent,
} from '../types/inference.types.js';
import { decode, firstText } from '../codec/titanCodec.js';
import { DecodingError, EmptyResultError } from '../errors/codec.js';

export type StreamLogger = Pick<FastifyBaseLogger, 'debug' | 'warn'>;

export interface StreamTextOptions {
  logger?: StreamLogger;
  /** What a non-data event does to the stream. Defaults to `'terminate'`. */
  controlFrames?: ControlFramePolicy;
  /** Called once, after the source has been released. */
  onClose?: (reason: StreamCloseReason) => void;
}

export function isFailure(reason: StreamCloseReason): boolean {
  return reason === 'decode-failure' || reason === 'empty-result' || reason === 'channel-failure';
}

function chunkText(event: Extract<StreamEvent, { type: 'chunk' }>): string {
  if (!event.bytes) {
    throw new DecodingError('Stream chunk carried no payload');
  }
  return firstText(decode(event.bytes));
}

export interface TextStream extends AsyncIterator<string, StreamCloseReason, undefined> {
  return(
    value?: StreamCloseReason | PromiseLike<StreamCloseReason>,
  ): Promise<IteratorResult<string, StreamCloseReason>>;
  [Symbol.asyncIterator](): TextStream;
}

async function release(iterator: AsyncIterator<StreamEvent>, logger?: StreamLogger): Promise<void> {
  if (!iterator.return) return;
  try {
    await iterator.return();
  } catch (err) {
    logger?.warn({ err }, 'failed to release upstream stream');
  }
}

async function* pump(
  iterator: AsyncIterator<StreamEvent>,
  options: StreamTextOptions,
): AsyncGenerator<string, StreamCloseReason, undefined> {
  const { logger, controlFrames = 'terminate', onClose } = options;
  let reason: StreamCloseReason = 'cancelled';
  let exhausted = false;

  try {
    while (true) {
      let next: IteratorResult<StreamEvent>;
      try {
        next = await iterator.next();
      } catch (err) {
        exhausted = true;
        reason = 'channel-failure';
        logger?.warn({ err }, 'upstream stream failed');
        return reason;
      }

      if (next.done) {
        exhausted = true;
        reason = 'end-of-stream';
        logger?.debug('upstream stream completed');
        return reason;
      }

      const event = next.value;
      if (event.type === 'control') {
        if (controlFrames === 'skip') {
          logger?.debug({ event: event.name }, 'skipping control frame');
          continue;
        }
        reason = 'control-frame';
        logger?.debug({ event: event.name }, 'control frame ends stream');
        return reason;
      }

      let text: string;
      try {
        text = chunkText(event);
      } catch (err) {
        reason = err instanceof EmptyResultError ? 'empty-result' : 'decode-failure';
        logger?.warn({ err }, reason === 'empty-result' ? 'stream chunk had no results' : 'unable to decode stream chunk');
        return reason;
      }

      yield text;
    }
  } finally {
    if (!exhausted) {
      await release(iterator, logger);
    }
    onClose?.(reason);
  }
}

/**
 * Turns an open chunk source into a lazy sequence of text fragments, one per
 * data chunk, in arrival order.
 *
 * Nothing is read ahead: the source is pulled only when the consumer asks for
 * the next fragment. Any failure ends the sequence without throwing; the
 * final result's value says why it closed. Calling `return()` early, even
 * before the first `next()`, releases the source without another pull.
 */
export function streamText(source: ChunkSource, options: StreamTextOptions = {}): TextStream {
  const iterator = source[Symbol.asyncIterator]();
  const fragments = pump(iterator, options);
  let started = false;

  const stream: TextStream = {
    next() {
      started = true;
      return fragments.next();
    },
    async return(value) {
      // An unstarted generator never reaches its finally block
      if (!started) {
        started = true;
        await release(iterator, options.logger);
        options.onClose?.('cancelled');
      }
      return fragments.return(value ?? 'cancelled');
    },
    [Symbol.asyncIterator]() {
      return stream;
    },
  };
  return stream;
}
