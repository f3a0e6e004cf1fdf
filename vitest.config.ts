import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.{test,spec}.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/.{git,cache,output,temp}/**',
    ],
    environment: 'node',
    setupFiles: ['src/__tests__/setup.ts'],
    testTimeout: 30000,
    passWithNoTests: false,
  },
})
