import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'manifest-import',
    include: ['engine/**/*.test.ts', 'api/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
    pool: 'forks'
  }
});
