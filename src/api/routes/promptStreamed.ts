import { Readable } from 'node:stream';
import type { FastifyInstance } from 'fastify';
import type { PromptRelay } from '../../relay/promptRelay.js';
import { isFailure } from '../../streaming/streamAdapter.js';
import { promptBodySchema, type ErrorResponse } from '../schemas.js';

export function registerPromptStreamedRoute(app: FastifyInstance, relay: PromptRelay): void {
  app.post('/prompt/streamed', async (req, reply) => {
    const parsed = promptBodySchema.safeParse(req.body);
    if (!parsed.success) {
      const body: ErrorResponse = { error: 'prompt is required', code: 'INVALID_BODY' };
      return reply.status(400).send(body);
    }

    // Stop pulling from upstream once the client is gone
    const abort = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableFinished) {
        req.log.debug('client disconnected mid-stream');
        abort.abort();
      }
    });

    const fragments = await relay.stream(parsed.data.prompt, {
      signal: abort.signal,
      logger: req.log,
      onClose: (reason) => {
        if (isFailure(reason)) {
          req.log.info({ reason }, 'stream ended early');
        }
      },
    });

    return reply.type('text/plain; charset=utf-8').send(Readable.from(fragments));
  });
}
