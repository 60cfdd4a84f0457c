import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration
 *
 * Runs the unit tests of every workspace package (core, config, observability)
 * in a single pass. Workspace packages resolve through their package.json
 * `exports`, which point at TypeScript sources, so no build is needed first.
 */
export default defineConfig({
  test: {
    name: 'unit',
    globals: true,
    environment: 'node',
    include: [
      'core/src/__tests__/**/*.unit.test.ts',
      'config/src/__tests__/**/*.unit.test.ts',
      'observability/src/__tests__/**/*.unit.test.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['**/src/**/*.ts'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        '**/__tests__/**',
      ],
      thresholds: {
        statements: 70,
        branches: 65,
        functions: 70,
        lines: 70,
      },
    },
  },
});
