import Fastify, { type FastifyInstance } from 'fastify';
import type { InferenceClient } from '../backends/inferenceClient.js';
import type { LogLevel, StreamConfig } from '../types/config.types.js';
import { PromptRelay } from '../relay/promptRelay.js';
import { registerErrorHandler } from './errorHandler.js';
import { registerRootRoute } from './routes/root.js';
import { registerPromptRoute } from './routes/prompt.js';
import { registerPromptStreamedRoute } from './routes/promptStreamed.js';

export interface ApiServerDeps {
  inferenceClient: InferenceClient;
  modelId: string;
  stream?: StreamConfig;
  /** Enables Fastify's logger at this level. Logging is off when omitted. */
  logLevel?: LogLevel;
}

/**
 * Creates a Fastify server with all 3 routes registered.
 * Does NOT call listen() — caller must do that (or use server.inject() in tests).
 */
export function createApiServer(deps: ApiServerDeps): FastifyInstance {
  const app = Fastify({ logger: deps.logLevel ? { level: deps.logLevel } : false });
  const relay = new PromptRelay(deps.inferenceClient, {
    modelId: deps.modelId,
    ...(deps.stream && { controlFrames: deps.stream.controlFrames }),
  });

  registerErrorHandler(app);
  registerRootRoute(app);
  registerPromptRoute(app, relay);
  registerPromptStreamedRoute(app, relay);

  return app;
}
