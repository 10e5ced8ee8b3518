import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['**/__tests__/**', 'src/index.ts', 'src/types/**'],
    },
    testTimeout: 10000,
    clearMocks: true,
    restoreMocks: true,
  },
});
