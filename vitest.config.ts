import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Suppress stdout from passing tests
    silent: process.env.VERBOSE_TESTS === 'true' ? false : 'passed-only',
    environment: 'node',
    // Submodule and cache tests touch the file system heavily
    testTimeout: 15000,
    coverage: {
      reporter: ['text', 'html'],
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.d.ts',
        '**/*.config.*',
        'tests/**'
      ]
    },
    include: [
      'tests/**/*.test.ts'
    ]
  }
});
