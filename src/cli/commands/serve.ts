import type { Command } from 'commander';
import { loadConfig } from '../../config/loader.js';
import { validateConfig } from '../../config/validator.js';
import { BedrockInferenceClient } from '../../backends/bedrockClient.js';
import { createApiServer } from '../../api/server.js';

export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the HTTP relay')
    .option('--port <n>', 'Port to listen on (default from config)')
    .option('--host <h>', 'Host to bind to (default from config)')
    .action(async (opts: { port?: string; host?: string }) => {
      const config = loadConfig();
      if (opts.port !== undefined) config.api.port = parseInt(opts.port, 10);
      if (opts.host !== undefined) config.api.host = opts.host;
      // Missing secrets are fatal: nothing is served without a client
      validateConfig(config);

      const client = new BedrockInferenceClient(config.aws);
      const app = createApiServer({
        inferenceClient: client,
        modelId: config.modelId,
        stream: config.stream,
        logLevel: config.logLevel,
      });

      await app.listen({ port: config.api.port, host: config.api.host });
    });
}
