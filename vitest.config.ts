import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['Tests/**/*_test.ts', 'web/src/**/*.test.ts'],
  },
});
