import path from 'path'
import { fileURLToPath } from 'url'
import { defineConfig } from 'vitest/config'

const __dirname = path.dirname(fileURLToPath(import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      '@substore/types': path.resolve(__dirname, './packages/types/src/index.ts'),
      '@substore/logger': path.resolve(__dirname, './packages/logger/src/index.ts'),
      '@substore/api-client': path.resolve(__dirname, './packages/api-client/src/index.ts'),
      '@': path.resolve(__dirname, './apps/client/src'),
    },
  },
  test: {
    environment: 'node',
    setupFiles: ['./vitest.setup.ts'],
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**', 'apps/*/src/**'],
      exclude: ['**/*.test.ts', '**/__tests__/**'],
    },
  },
})
