export interface TextGenerationConfig {
  temperature: number;
  topP: number;
  maxTokenCount: number;
  stopSequences: string[];
}

/** Request body for the Titan text models. */
export interface GenerationRequest {
  inputText: string;
  textGenerationConfig: TextGenerationConfig;
}

export interface GenerationCandidate {
  tokenCount: number;
  outputText: string;
  // null on intermediate stream chunks
  completionReason: string | null;
}

export interface GenerationResult {
  inputTextTokenCount: number;
  results: GenerationCandidate[];
}
