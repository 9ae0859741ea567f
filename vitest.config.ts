import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/__vitest__/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
