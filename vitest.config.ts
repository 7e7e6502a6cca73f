import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    testTimeout: 30000,
    hookTimeout: 30000,
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '.git', '.cache'],
  },
  resolve: {
    alias: {
      '@hydrant/runtime-core': new URL('./packages/runtime-core/src/index.ts', import.meta.url).pathname,
      '@hydrant/runtime-node': new URL('./packages/runtime-node/src/index.ts', import.meta.url).pathname,
    },
  },
})
