import path from 'path'

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    isolate: true,
    pool: 'threads',

    // Mock cleanup settings
    mockReset: true,
    clearMocks: true,
    restoreMocks: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/*.test.ts',
        '**/index.ts',
        'src/types/**',
        'src/test-utils/**',
      ],
      thresholds: {
        branches: 85,
        functions: 90,
        lines: 90,
        statements: 90,
      },
    },

    include: ['src/**/*.test.ts', 'tools/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@boot': path.resolve(__dirname, './src/boot'),
      '@core': path.resolve(__dirname, './src/core'),
      '@events': path.resolve(__dirname, './src/events'),
      '@hardware': path.resolve(__dirname, './src/hardware'),
      '@logging': path.resolve(__dirname, './src/logging'),
      '@system': path.resolve(__dirname, './src/system'),
      '@utils': path.resolve(__dirname, './src/utils'),
      '@validation': path.resolve(__dirname, './src/validation'),
      '$types': path.resolve(__dirname, './src/types'),
      '$test-utils': path.resolve(__dirname, './src/test-utils'),
    },
  },
})
