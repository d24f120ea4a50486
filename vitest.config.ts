import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['Backend/src/**/*.test.ts', 'Frontend/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
