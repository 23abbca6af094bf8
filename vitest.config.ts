import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const alias = {
  '@libs/jquants-client': fileURLToPath(
    new URL('./libs/jquants-client/src/index.ts', import.meta.url),
  ),
};

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['libs/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
