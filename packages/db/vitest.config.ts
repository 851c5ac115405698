import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    name: 'db',
    globals: true,
    environment: 'node',
    include: ['__tests__/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
})
