import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Environment
    globals: false,
    environment: 'node',

    // Test execution
    testTimeout: 5000,
    hookTimeout: 5000,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/index.ts', 'tests/**/*', 'dist/**/*'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 70,
        statements: 80
      }
    },

    // Test file patterns
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    reporters: ['default'],

    // Setup files
    setupFiles: ['./tests/setup.ts'],

    // Mock configuration
    mockReset: true,
    restoreMocks: true,
    clearMocks: true
  }
})
