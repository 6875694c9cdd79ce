import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@formprobe/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@formprobe/ai': fileURLToPath(new URL('./packages/ai/src/index.ts', import.meta.url))
    }
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node'
  }
});
