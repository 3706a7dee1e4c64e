import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    include: ['packages/**/src/**/*.{test,spec}.ts'],
    environment: 'node',
    globals: false,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
    },
  },
  resolve: {
    alias: {
      '@restlift/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
      '@restlift/adapters-documents': fileURLToPath(
        new URL('./packages/adapters/documents/src/index.ts', import.meta.url)
      ),
    },
  },
});
