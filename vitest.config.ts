import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Globals disabled - explicit imports required
    globals: false,

    // Test patterns
    include: ['test/**/*.test.ts'],

    environment: 'node',

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: [
        'src/cli.ts', // CLI entry (argument parsing and printing only)
        'src/index.ts', // Re-exports
      ],
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 60,
        statements: 70,
      },
    },

    // Test setup file
    setupFiles: ['./test/setup.ts'],
  },
});
