import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['index.test.ts', 'src/**/*.test.ts', 'test-config/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15000,
  },
});
