import type { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { validateConfig } from '../../config/validator.js';
import { BedrockInferenceClient } from '../../backends/bedrockClient.js';
import { PromptRelay } from '../../relay/promptRelay.js';
import { isFailure } from '../../streaming/streamAdapter.js';

export function registerPromptCommand(program: Command): void {
  program
    .command('prompt <text>')
    .description('Send one prompt to the model and print the completion')
    .option('--stream', 'Print the completion as it is generated')
    .action(async (text: string, opts: { stream?: boolean }) => {
      const config = loadConfig();
      validateConfig(config);
      const relay = new PromptRelay(new BedrockInferenceClient(config.aws), {
        modelId: config.modelId,
        controlFrames: config.stream.controlFrames,
      });

      if (opts.stream) {
        const fragments = await relay.stream(text, {
          onClose: (reason) => {
            if (isFailure(reason)) {
              process.stderr.write(`\n[titan-relay] stream ended early: ${reason}\n`);
            }
          },
        });
        for await (const fragment of fragments) {
          process.stdout.write(fragment);
        }
      } else {
        process.stdout.write(await relay.complete(text));
      }
      process.stdout.write('\n');
    });
}
