import { defineConfig } from 'vitest/config';

/**
 * Shared Vitest Configuration
 *
 * Extended by every project in vitest.workspace.ts. Workspace packages are
 * resolved through their package.json `exports`, which point at the
 * TypeScript sources, so no aliases are needed.
 */
export default defineConfig({
  test: {
    environment: 'node',
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
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80,
      },
    },
  },
});
