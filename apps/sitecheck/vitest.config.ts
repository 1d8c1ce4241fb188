import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: [
        'src/analytics/latency.ts',
        'src/analytics/stats.ts',
        'src/monitor/retry.ts',
        'src/monitor/validate.ts',
        'src/scheduler/pool.ts',
        'src/scheduler/queue.ts',
        'src/scheduler/rounds.ts',
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
