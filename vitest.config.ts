import {defineConfig} from 'vitest/config'

export default defineConfig({
  test: {
    include: ['test/**/*.test.mts'],
    environment: 'node',
    testTimeout: 20_000,
  },
})
