import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'logger',
    environment: 'node',
    include: ['test/**/*.test.ts'],
  },
});
