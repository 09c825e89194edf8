import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Core keeps tests beside the sources, the CLI under tests/
    include: ['packages/*/src/**/*.test.ts', 'packages/*/tests/**/*.test.ts'],
    setupFiles: ['packages/core/src/test-setup.ts'],
  },
})
