import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'panel-geocoder',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 10_000,
    pool: 'forks',
    environment: 'node',
  },
});
