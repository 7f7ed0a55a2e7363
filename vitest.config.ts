import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['mastodon/typescript/src/**/*.test.ts'],
  },
});
