import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['tests/**/*.test.ts', 'src/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    testTimeout: 30000,
    hookTimeout: 30000,
    reporters: 'default',
    // Allow parallelism by default; can be disabled with STAGEHUB_TEST_SERIAL=1
    fileParallelism: process.env.STAGEHUB_TEST_SERIAL === '1' ? false : true,
    // Use forked workers so per-test process listeners stay isolated
    pool: 'forks',
  },
  esbuild: {
    target: 'node20',
  },
});
