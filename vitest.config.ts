import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['server/**/*.test.ts', 'services/**/*.test.ts'],
    env: { NODE_ENV: 'test', LOG_LEVEL: 'info' },
    coverage: {
      provider: 'v8',
      reportsDirectory: 'coverage',
      reporter: ['text-summary', 'lcov'],
      all: true,
      include: ['server/**/*.ts', 'services/**/*.ts'],
      exclude: ['**/*.d.ts', '**/*.test.ts', 'services/discovery/fixtures.ts', 'server/main.ts'],
      thresholds: {
        lines: 80,
        branches: 80,
        functions: 80,
        statements: 80,
      },
    },
  },
});
