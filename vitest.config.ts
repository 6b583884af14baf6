import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['functions/**/*.test.ts', 'shared/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['functions/api/**/*.ts', 'functions/lib/**/*.ts', 'shared/db/**/*.ts'],
      exclude: ['**/*.test.ts', 'functions/lib/test-utils.ts'],
    },
  },
})
