import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'eventbus',
    include: ['src/**/*.test.ts'],
    environment: 'node',
  },
});
