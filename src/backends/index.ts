export type { InferenceClient } from './inferenceClient.js';
export { BedrockInferenceClient } from './bedrockClient.js';
