import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.js',
        '**/vitest.config.*',
        'src/index.ts',
        'src/tests/**',
      ],
    },
  },
});
