import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'tool-client',
    environment: 'node',
    setupFiles: ['./test/setup.ts'],
    include: ['test/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
