/**
 * Workspace-level Vitest config for @turnkit/transcript-pipeline
 *
 * WHY: `npm test -w` runs from this directory, where the root include
 *      patterns don't resolve.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    passWithNoTests: false,
  },
});
