// Public API — explicit named exports only (no re-export *)

export type { InferenceClient } from './backends/index.js';
export type { AppConfig, AwsConfig, StreamConfig } from './types/config.types.js';
export type {
  ChunkSource,
  StreamEvent,
  StreamCloseReason,
  ControlFramePolicy,
} from './types/inference.types.js';
export type {
  GenerationRequest,
  GenerationResult,
  GenerationCandidate,
  TextGenerationConfig,
} from './types/titan.types.js';
export type { StreamTextOptions, StreamLogger, TextStream } from './streaming/streamAdapter.js';

export { BedrockInferenceClient } from './backends/index.js';
export { encode, decode, firstText, buildRequest, GENERATION_CONFIG } from './codec/titanCodec.js';
export { streamText, isFailure } from './streaming/streamAdapter.js';
export { PromptRelay } from './relay/promptRelay.js';
export { createApiServer } from './api/server.js';
export {
  loadConfig,
  validateConfig,
  ConfigValidationError,
  DEFAULT_CONFIG,
  DEFAULT_MODEL_ID,
} from './config/index.js';
export { RelayError, EncodingError, DecodingError, EmptyResultError, ChannelError } from './errors/index.js';
