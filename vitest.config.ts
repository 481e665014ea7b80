import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // signals are only delivered to forked workers
    pool: 'forks',
    setupFiles: ['./vitest.setup.ts'],
    include: ['tests/**/*.{spec,test}.ts'],
    testTimeout: 15_000,
    hookTimeout: 15_000,
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
