import type { ChunkSource } from '../types/inference.types.js';

export interface InferenceClient {
  invokeOnce(modelId: string, payload: Uint8Array): Promise<Uint8Array>;
  invokeStreaming(modelId: string, payload: Uint8Array, signal?: AbortSignal): Promise<ChunkSource>;
}
