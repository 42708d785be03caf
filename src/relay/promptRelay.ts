import type { InferenceClient } from '../backends/inferenceClient.js';
import type { ControlFramePolicy, StreamCloseReason } from '../types/inference.types.js';
import { decode, encode, firstText } from '../codec/titanCodec.js';
import { streamText, type StreamLogger, type TextStream } from '../streaming/streamAdapter.js';

export interface PromptRelayOptions {
  modelId: string;
  controlFrames?: ControlFramePolicy;
}

export interface StreamPromptOptions {
  signal?: AbortSignal;
  logger?: StreamLogger;
  onClose?: (reason: StreamCloseReason) => void;
}

/**
 * Sends prompts to a single fixed model through a shared inference client.
 */
export class PromptRelay {
  private readonly modelId: string;
  private readonly controlFrames: ControlFramePolicy;

  constructor(
    private readonly client: InferenceClient,
    options: PromptRelayOptions,
  ) {
    this.modelId = options.modelId;
    this.controlFrames = options.controlFrames ?? 'terminate';
  }

  async complete(prompt: string): Promise<string> {
    const payload = encode(prompt);
    const bytes = await this.client.invokeOnce(this.modelId, payload);
    return firstText(decode(bytes));
  }

  /**
   * Opens the upstream stream and returns the fragment sequence. Rejects only
   * when encoding fails or the stream cannot be opened; once this resolves,
   * failures end the sequence instead.
   */
  async stream(
    prompt: string,
    options: StreamPromptOptions = {},
  ): Promise<TextStream> {
    const payload = encode(prompt);
    const source = await this.client.invokeStreaming(this.modelId, payload, options.signal);
    return streamText(source, {
      controlFrames: this.controlFrames,
      ...(options.logger && { logger: options.logger }),
      ...(options.onClose && { onClose: options.onClose }),
    });
  }
}
