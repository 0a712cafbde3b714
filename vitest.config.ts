import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    env: { MAKEGATE_LOG_LEVEL: 'silent' },
    testTimeout: 20_000,
  },
});
