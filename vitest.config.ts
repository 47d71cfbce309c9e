/**
 * Vitest configuration
 *
 * @see https://vitest.dev/config/
 */

import { defineConfig, configDefaults } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    exclude: [...configDefaults.exclude, 'dist/**'],
    environment: 'node',
    watch: false,
    passWithNoTests: false,
  },
});
