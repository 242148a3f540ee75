import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: './src/setupTests.ts',
    testTimeout: 10000,
  },
})
