#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerServeCommand } from './commands/serve.js';
import { registerPromptCommand } from './commands/prompt.js';

const require = createRequire(import.meta.url);

const pkg = require('../../package.json') as { version: string; description: string };

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('titan-relay')
    .description(pkg.description)
    .version(pkg.version);

  registerServeCommand(program);
  registerPromptCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`[titan-relay] Error: ${message}\n`);
  process.exit(1);
});
