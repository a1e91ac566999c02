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
    // Allow parallelism by default; can be disabled with IPCD_TEST_SERIAL=1
    fileParallelism: process.env.IPCD_TEST_SERIAL === '1' ? false : true,
    // Use forked workers for better process isolation when parallel
    pool: process.env.IPCD_TEST_SERIAL === '1' ? 'threads' : 'forks',
    coverage: {
      reporter: ['text', 'html', 'lcov'],
      provider: 'v8',
    },
  },
  esbuild: {
    target: 'node20',
  },
});
