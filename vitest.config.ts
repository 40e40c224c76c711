import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    globals: true,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
