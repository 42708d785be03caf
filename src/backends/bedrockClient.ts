import {
  BedrockRuntimeClient,
  BedrockRuntimeServiceException,
  InvokeModelCommand,
  InvokeModelWithResponseStreamCommand,
  type ResponseStream,
} from '@aws-sdk/client-bedrock-runtime';
import type { AwsConfig } from '../types/config.types.js';
import type { ChunkSource, StreamEvent } from '../types/inference.types.js';
import type { InferenceClient } from './inferenceClient.js';
import { ChannelError } from '../errors/backend.js';

function toChannelError(operation: string, err: unknown): ChannelError {
  if (err instanceof ChannelError) return err;
  const detail = err instanceof Error ? err.message : String(err);
  const status =
    err instanceof BedrockRuntimeServiceException ? err.$metadata.httpStatusCode : undefined;
  return new ChannelError(`Bedrock ${operation} failed: ${detail}`, status, err);
}

function controlName(event: ResponseStream): string {
  const entry = Object.entries(event).find(([, value]) => value !== undefined);
  return entry?.[0] ?? 'unknown';
}

async function* toChunkSource(
  events: AsyncIterable<ResponseStream>,
): AsyncGenerator<StreamEvent, void, undefined> {
  try {
    for await (const event of events) {
      if (event.chunk) {
        yield { type: 'chunk', bytes: event.chunk.bytes };
      } else {
        yield { type: 'control', name: controlName(event) };
      }
    }
  } catch (err) {
    throw toChannelError('response stream', err);
  }
}

function createRuntime(config: AwsConfig): BedrockRuntimeClient {
  return new BedrockRuntimeClient({
    region: config.region,
    endpoint: config.endpointUrl,
    credentials: {
      accessKeyId: config.accessKeyId,
      secretAccessKey: config.secretAccessKey,
    },
  });
}

/**
 * Inference client backed by the Bedrock runtime SDK. Holds no per-request
 * state, so one instance is shared by every request.
 */
export class BedrockInferenceClient implements InferenceClient {
  private readonly runtime: BedrockRuntimeClient;

  constructor(config: AwsConfig) {
    this.runtime = createRuntime(config);
  }

  async invokeOnce(modelId: string, payload: Uint8Array): Promise<Uint8Array> {
    try {
      const res = await this.runtime.send(
        new InvokeModelCommand({
          modelId,
          body: payload,
          contentType: 'application/json',
          accept: 'application/json',
        }),
      );
      return res.body;
    } catch (err) {
      throw toChannelError('InvokeModel', err);
    }
  }

  async invokeStreaming(
    modelId: string,
    payload: Uint8Array,
    signal?: AbortSignal,
  ): Promise<ChunkSource> {
    let body: AsyncIterable<ResponseStream> | undefined;
    try {
      const res = await this.runtime.send(
        new InvokeModelWithResponseStreamCommand({
          modelId,
          body: payload,
          contentType: 'application/json',
          accept: 'application/json',
        }),
        signal ? { abortSignal: signal } : undefined,
      );
      body = res.body;
    } catch (err) {
      throw toChannelError('InvokeModelWithResponseStream', err);
    }

    if (!body) {
      throw new ChannelError('No response body for stream');
    }
    return toChunkSource(body);
  }
}
