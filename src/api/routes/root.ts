import type { FastifyInstance } from 'fastify';

export const GREETING = 'Hello, world!';

export function registerRootRoute(app: FastifyInstance): void {
  app.get('/', async (_req, reply) => {
    return reply.type('text/plain; charset=utf-8').send(GREETING);
  });
}
