import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    // PGlite boots a WASM PostgreSQL per test file.
    testTimeout: 30_000,
    hookTimeout: 60_000,
  },
})
