/**
 * FILE PURPOSE: Root Vitest config for the monorepo
 *
 * WHY: `npm test` at the root runs every package's tests in one pass.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/**/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**'],
    passWithNoTests: false,
    coverage: {
      provider: 'v8',
      include: ['packages/**/src/**/*.ts'],
      exclude: ['**/index.ts'],
    },
  },
});
