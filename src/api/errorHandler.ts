import type { FastifyInstance } from 'fastify';
import { RelayError } from '../errors/base.js';
import { EncodingError, DecodingError, EmptyResultError } from '../errors/codec.js';
import { ChannelError } from '../errors/backend.js';
import type { ErrorResponse } from './schemas.js';

function hasStatusCode(err: Error): err is Error & { statusCode: number } {
  return 'statusCode' in err && typeof err.statusCode === 'number';
}

export function httpStatusFor(err: Error): number {
  if (err instanceof EncodingError) return 400;
  if (err instanceof DecodingError || err instanceof EmptyResultError) return 500;
  if (err instanceof ChannelError) return 502;
  if (err instanceof RelayError) return 500;
  // Fastify's own errors (bad JSON, unsupported media type) carry a status
  if (hasStatusCode(err) && err.statusCode >= 400 && err.statusCode < 600) return err.statusCode;
  return 500;
}

function errorCode(err: Error, status: number): string {
  if (err instanceof RelayError) return err.code;
  if ('code' in err && typeof err.code === 'string' && err.code.trim()) return err.code;
  return status >= 500 ? 'INTERNAL_ERROR' : 'BAD_REQUEST';
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: Error, req, reply) => {
    const status = httpStatusFor(err);
    if (status >= 500) {
      req.log.error({ err }, 'request failed');
    } else {
      req.log.info({ err }, 'request rejected');
    }
    const body: ErrorResponse = { error: err.message, code: errorCode(err, status) };
    return reply.status(status).send(body);
  });
}
