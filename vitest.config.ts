import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const pkg = (path: string): string => fileURLToPath(new URL(path, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@storelens/core': pkg('./packages/core/src/index.ts'),
      '@storelens/dal': pkg('./packages/dal/src/index.ts'),
      '@storelens/store': pkg('./packages/store/src/index.ts'),
      '@storelens/analytics': pkg('./packages/analytics/src/index.ts')
    }
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts', 'apps/*/tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/*/src/**/*.ts', 'apps/*/src/**/*.ts'],
      exclude: ['**/index.ts']
    },
    testTimeout: 30000
  }
})
