import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'decision',
    include: ['src/**/*.test.ts'],
    environment: 'node',
  },
});
