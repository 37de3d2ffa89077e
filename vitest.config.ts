import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      // Workspace packages are tested from their sources, no build needed
      'pr-kit': fileURLToPath(new URL('./tools/pr-kit/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['tools/*/tests/**/*.test.ts'],
  },
});
