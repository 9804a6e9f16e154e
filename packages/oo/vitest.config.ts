import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'oo',
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
});
