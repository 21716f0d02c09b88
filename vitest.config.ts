import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    // fast-check defaults for the property suites under tests/fuzz
    setupFiles: ['./tests/fuzz/setup.ts'],
    // tests/fuzz/lib/harness.test.ts mutates FUZZ_* environment variables
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
  },
})
