import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for cdkeygen.
 *
 * Tests live beside their sources as `*.test.ts`.
 */
export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
    },
  },
});
