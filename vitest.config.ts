/**
 * Vitest Configuration
 *
 * Each package runs as its own project with shared settings.
 *
 * Shared Configuration:
 * - globals: true (enables global test functions)
 * - environment: 'node' (Node.js test environment)
 * - coverage: v8 provider with text, html, lcov reporters
 *
 * Run specific projects:
 *   npx vitest --project=core
 */
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/index.ts', 'packages/*/src/runtime/index.ts'],
    },
    projects: [
      // Core package (@pyfunc/core)
      {
        test: {
          name: 'core',
          globals: true,
          environment: 'node',
          include: ['packages/core/tests/**/*.test.ts'],
        },
      },
    ],
  },
});
