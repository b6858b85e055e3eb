import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'terminal',
    include: ['src/**/*.test.ts'],
    environment: 'node',
  },
});
