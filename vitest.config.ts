import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['cli-ts/src/**/*.test.ts'],
    environment: 'node',
  },
});
