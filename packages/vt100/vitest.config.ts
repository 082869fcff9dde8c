import { defineConfig } from 'vitest/config'

const verbose = process.env.VITEST_VERBOSE === 'true'
const coverage = process.env.VITEST_COVERAGE === 'true'

export default defineConfig({
  test: {
    globals: false,
    reporters: ['default'],
    silent: !verbose,
    include: ['src/**/*.test.ts', 'test/**/*.test.ts'],
    coverage: {
      enabled: coverage,
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.test.ts'],
    },
  },
})
