import { mkdirSync } from 'node:fs';
import { defineConfig } from 'vitest/config';

// Tests create scratch datasets and run directories under the OS temp dir.
const resolvedTmpDir =
  process.env.TMPDIR && process.env.TMPDIR.trim().length > 0 ? process.env.TMPDIR : '/tmp';
process.env.TMPDIR = resolvedTmpDir;
mkdirSync(resolvedTmpDir, { recursive: true });

/**
 * Vitest configuration for praxis-gate
 *
 * Every test is a unit test: datasets are written to temp directories and
 * subprocesses are replaced by injected command runners.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'vitest.config.ts', 'vitest.setup.ts'],
    },
  },
});
