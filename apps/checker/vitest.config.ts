import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: [
        'src/monitor/batch.ts',
        'src/monitor/http.ts',
        'src/monitor/retry.ts',
        'src/monitor/semaphore.ts',
        'src/monitor/status.ts',
        'src/report/summary.ts',
      ],
      thresholds: {
        lines: 90,
        functions: 90,
        statements: 90,
        branches: 85,
      },
    },
  },
});
