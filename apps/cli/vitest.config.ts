import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['../gateway/tests/setup.ts'],
  },
  resolve: {
    alias: {
      '@main': fileURLToPath(new URL('../gateway/src/main', import.meta.url)),
      '@tests': fileURLToPath(new URL('../gateway/tests', import.meta.url)),
    },
  },
});
