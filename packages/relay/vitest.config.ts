import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'relay',
    globals: true,
    passWithNoTests: true,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'json'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['src/**/__tests__/**', 'src/**/*.test.ts', 'src/**/index.ts', 'src/bin.ts'],
      thresholds: {
        branches: 80,
        functions: 85,
        lines: 84,
        statements: 84,
      },
    },
  },
});
