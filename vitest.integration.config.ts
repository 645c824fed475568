import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: false,
    include: ['packages/server/tests/integration/**/*.test.ts'],
    testTimeout: 30_000,
  },
})
