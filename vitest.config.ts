import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/unit/**/*.test.ts'],
    environment: 'node',
    globals: true,
    testTimeout: 10000,
    // The SDK resolves to an in-process fake; googleapis is mocked in setup
    alias: {
      '@anthropic-ai/sdk': fromRoot('./tests/mocks/anthropic.ts'),
    },
  },
});
