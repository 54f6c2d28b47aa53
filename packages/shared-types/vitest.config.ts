/**
 * Workspace-level Vitest config for @turnkit/shared-types
 *
 * WHY: Mostly types. The tests only cover the turn type constants and guards.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    passWithNoTests: true,
  },
});
