import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    root: fileURLToPath(new URL('.', import.meta.url)),
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 10_000,
    pool: 'forks',
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
