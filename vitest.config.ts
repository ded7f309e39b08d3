import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/**/test/**/*.spec.ts',
      'apps/**/test/**/*.spec.ts'
    ],
    reporters: ['default'],
    testTimeout: 10000
  }
});
