import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.{test,spec}.{js,ts}'],
    exclude: ['node_modules', 'dist'],
    passWithNoTests: true,
    testTimeout: 30000, // Property tests may take longer
  },
});
