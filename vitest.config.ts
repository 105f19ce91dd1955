import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary'],
      reportsDirectory: './coverage',
      exclude: ['node_modules/**', 'dist/**', 'tests/**', '**/types.ts', '**/*.config.ts', '**/index.ts'],
    },
    // Test timeouts
    testTimeout: 10000,
    hookTimeout: 10000,
    // Reporter
    reporters: ['default'],
    // Undo vi.stubGlobal('fetch', ...) between tests
    unstubGlobals: true,
  },
});
