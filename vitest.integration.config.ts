import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.{test,spec}.ts'], // Needs DATABASE_URL
    pool: 'forks',
    maxWorkers: 1,
    minWorkers: 1,
    maxConcurrency: 1,
  },
});
