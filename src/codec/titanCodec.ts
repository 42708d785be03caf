import { z } from 'zod';
import type { GenerationRequest, GenerationResult, TextGenerationConfig } from '../types/titan.types.js';
import { DecodingError, EmptyResultError, EncodingError } from '../errors/codec.js';

/** Sampling settings sent with every prompt. Not overridable per request. */
export const GENERATION_CONFIG: Readonly<TextGenerationConfig> = Object.freeze({
  temperature: 0.0,
  topP: 0.0,
  maxTokenCount: 100,
  stopSequences: ['|'],
});

const generationResultSchema = z.object({
  inputTextTokenCount: z.number(),
  results: z.array(
    z.object({
      tokenCount: z.number(),
      outputText: z.string(),
      completionReason: z.string().nullable(),
    }),
  ),
});

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

export function buildRequest(prompt: string): GenerationRequest {
  return {
    inputText: prompt,
    textGenerationConfig: {
      ...GENERATION_CONFIG,
      stopSequences: [...GENERATION_CONFIG.stopSequences],
    },
  };
}

export function encode(prompt: string): Uint8Array {
  try {
    return encoder.encode(JSON.stringify(buildRequest(prompt)));
  } catch (err) {
    throw new EncodingError('Failed to serialize generation request', err);
  }
}

export function decode(bytes: Uint8Array): GenerationResult {
  let raw: unknown;
  try {
    raw = JSON.parse(decoder.decode(bytes));
  } catch (err) {
    throw new DecodingError('Provider response is not valid JSON', err);
  }

  const parsed = generationResultSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new DecodingError(
      `Provider response does not match schema${where}: ${issue?.message ?? 'invalid'}`,
      parsed.error,
    );
  }
  return parsed.data;
}

export function firstText(result: GenerationResult): string {
  const first = result.results[0];
  if (!first) {
    throw new EmptyResultError();
  }
  return first.outputText;
}
