import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Closing a listening server after a client-aborted fetch waits for Node's
    // HTTP server to drop the idle socket undici leaves behind (headersTimeout).
    hookTimeout: 120_000,
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: [
        // Top-level re-exports
        'src/index.ts',
        'src/cli/index.ts',
        'src/**/index.ts',
        // Type-only files
        'src/types/**',
        'src/backends/inferenceClient.ts',
        // CLI command handlers (require stdin/stdout E2E testing)
        'src/cli/commands/**',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },
  },
  resolve: {
    conditions: ['node'],
  },
});
