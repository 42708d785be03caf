import { describe, it, expect, vi } from 'vitest';
import { streamText, isFailure, type TextStream } from '../../../src/streaming/streamAdapter.js';
import type { StreamCloseReason } from '../../../src/types/inference.types.js';
import { DecodingError, EmptyResultError } from '../../../src/errors/codec.js';
import {
  RecordingSource,
  controlFrame,
  dataChunk,
  emptyChunk,
  malformedChunk,
} from '../../fixtures/titanPayloads.js';

async function drain(
  gen: TextStream,
): Promise<{ fragments: string[]; reason: StreamCloseReason }> {
  const fragments: string[] = [];
  while (true) {
    const next = await gen.next();
    if (next.done) return { fragments, reason: next.value };
    fragments.push(next.value);
  }
}

function makeLogger() {
  return { debug: vi.fn(), warn: vi.fn() };
}

describe('streamText()', () => {
  it('emits one fragment per data chunk in arrival order, then ends', async () => {
    const source = new RecordingSource([dataChunk('The'), dataChunk(' quick'), dataChunk(' fox')]);

    const { fragments, reason } = await drain(streamText(source));

    expect(fragments).toEqual(['The', ' quick', ' fox']);
    expect(reason).toBe('end-of-stream');
    expect(source.pulls).toBe(4);
    expect(source.released).toBe(false);
  });

  it('stops after two fragments when the third of five chunks is malformed', async () => {
    const source = new RecordingSource([
      dataChunk('a'),
      dataChunk('b'),
      malformedChunk(),
      dataChunk('d'),
      dataChunk('e'),
    ]);
    const logger = makeLogger();

    const { fragments, reason } = await drain(streamText(source, { logger }));

    expect(fragments).toEqual(['a', 'b']);
    expect(reason).toBe('decode-failure');
    expect(source.pulls).toBe(3);
    expect(source.released).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith(
      { err: expect.any(DecodingError) },
      'unable to decode stream chunk',
    );
  });

  it('produces nothing when the source ends immediately', async () => {
    const source = new RecordingSource([]);
    const logger = makeLogger();

    const { fragments, reason } = await drain(streamText(source, { logger }));

    expect(fragments).toEqual([]);
    expect(reason).toBe('end-of-stream');
    expect(source.pulls).toBe(1);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('does not pull before the consumer asks', async () => {
    const source = new RecordingSource([dataChunk('a'), dataChunk('b')]);
    const gen = streamText(source);

    expect(source.pulls).toBe(0);
    await gen.next();
    expect(source.pulls).toBe(1);
    await gen.next();
    expect(source.pulls).toBe(2);
  });

  it('ends on a control frame by default', async () => {
    const source = new RecordingSource([dataChunk('a'), controlFrame(), dataChunk('b')]);

    const { fragments, reason } = await drain(streamText(source));

    expect(fragments).toEqual(['a']);
    expect(reason).toBe('control-frame');
    expect(source.pulls).toBe(2);
    expect(source.released).toBe(true);
  });

  it('skips control frames when configured to', async () => {
    const source = new RecordingSource([dataChunk('a'), controlFrame('metadata'), dataChunk('b')]);
    const logger = makeLogger();

    const { fragments, reason } = await drain(
      streamText(source, { logger, controlFrames: 'skip' }),
    );

    expect(fragments).toEqual(['a', 'b']);
    expect(reason).toBe('end-of-stream');
    expect(source.pulls).toBe(4);
    expect(logger.debug).toHaveBeenCalledWith({ event: 'metadata' }, 'skipping control frame');
  });

  it('ends when a chunk has no candidates', async () => {
    const source = new RecordingSource([dataChunk('a'), emptyChunk(), dataChunk('c')]);
    const logger = makeLogger();

    const { fragments, reason } = await drain(streamText(source, { logger }));

    expect(fragments).toEqual(['a']);
    expect(reason).toBe('empty-result');
    expect(source.pulls).toBe(2);
    expect(logger.warn).toHaveBeenCalledWith(
      { err: expect.any(EmptyResultError) },
      'stream chunk had no results',
    );
  });

  it('ends when a chunk carries no bytes', async () => {
    const source = new RecordingSource([{ type: 'chunk', bytes: undefined }]);

    const { fragments, reason } = await drain(streamText(source));

    expect(fragments).toEqual([]);
    expect(reason).toBe('decode-failure');
  });

  it('ends without throwing when the channel fails mid-stream', async () => {
    const source = new RecordingSource([dataChunk('a'), dataChunk('b'), dataChunk('c')], 1);
    const logger = makeLogger();

    const { fragments, reason } = await drain(streamText(source, { logger }));

    expect(fragments).toEqual(['a']);
    expect(reason).toBe('channel-failure');
    expect(source.pulls).toBe(2);
    expect(logger.warn).toHaveBeenCalledWith(
      { err: expect.any(Error) },
      'upstream stream failed',
    );
  });

  it('releases the source without another pull when the consumer stops', async () => {
    const source = new RecordingSource([dataChunk('a'), dataChunk('b'), dataChunk('c')]);
    const onClose = vi.fn();
    const fragments: string[] = [];

    for await (const fragment of streamText(source, { onClose })) {
      fragments.push(fragment);
      break;
    }

    expect(fragments).toEqual(['a']);
    expect(source.pulls).toBe(1);
    expect(source.released).toBe(true);
    expect(onClose).toHaveBeenCalledTimes(1);
    expect(onClose).toHaveBeenCalledWith('cancelled');
  });

  it('releases the source when returned before the first pull', async () => {
    const source = new RecordingSource([dataChunk('a'), dataChunk('b')]);
    const onClose = vi.fn();
    const stream = streamText(source, { onClose });

    const result = await stream.return();
    await stream.return();

    expect(result).toEqual({ done: true, value: 'cancelled' });
    expect(source.pulls).toBe(0);
    expect(source.released).toBe(true);
    expect(onClose).toHaveBeenCalledTimes(1);
    expect(onClose).toHaveBeenCalledWith('cancelled');
    expect(await stream.next()).toEqual({ done: true, value: undefined });
  });

  it('reports the close reason once through onClose', async () => {
    const source = new RecordingSource([dataChunk('a'), malformedChunk()]);
    const onClose = vi.fn();

    await drain(streamText(source, { onClose }));

    expect(onClose).toHaveBeenCalledTimes(1);
    expect(onClose).toHaveBeenCalledWith('decode-failure');
  });

  it('stays closed after terminating', async () => {
    const source = new RecordingSource([malformedChunk(), dataChunk('b')]);
    const gen = streamText(source);

    await drain(gen);
    const again = await gen.next();

    expect(again).toEqual({ done: true, value: undefined });
    expect(source.pulls).toBe(1);
  });
});

describe('isFailure()', () => {
  it('treats decode, empty and channel closes as failures', () => {
    expect(isFailure('decode-failure')).toBe(true);
    expect(isFailure('empty-result')).toBe(true);
    expect(isFailure('channel-failure')).toBe(true);
  });

  it('treats clean and consumer-driven closes as non-failures', () => {
    expect(isFailure('end-of-stream')).toBe(false);
    expect(isFailure('control-frame')).toBe(false);
    expect(isFailure('cancelled')).toBe(false);
  });
});
