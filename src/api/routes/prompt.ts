import type { FastifyInstance } from 'fastify';
import type { PromptRelay } from '../../relay/promptRelay.js';
import { promptBodySchema, type ErrorResponse } from '../schemas.js';

export function registerPromptRoute(app: FastifyInstance, relay: PromptRelay): void {
  app.post('/prompt', async (req, reply) => {
    const parsed = promptBodySchema.safeParse(req.body);
    if (!parsed.success) {
      const body: ErrorResponse = { error: 'prompt is required', code: 'INVALID_BODY' };
      return reply.status(400).send(body);
    }
    const text = await relay.complete(parsed.data.prompt);
    return reply.type('text/plain; charset=utf-8').send(text);
  });
}
