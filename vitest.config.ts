import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['q32-math/tests/**/*.test.ts'],
    environment: 'node',
  },
});
