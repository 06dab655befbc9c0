import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['tests/selector/**/*.test.ts'],
    testTimeout: 20000,
    setupFiles: ['./tests/setup-tests.ts'],
  },
})
