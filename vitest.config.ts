import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Run tests from root - sources carry unit tests, the CLI keeps its own tree
    include: ['packages/*/src/**/*.test.ts', 'packages/*/tests/**/*.test.ts'],
  },
})
