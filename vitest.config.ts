import { fileURLToPath } from 'node:url'

import { defineConfig } from 'vitest/config'

function src(dir: string): string {
  return fileURLToPath(new URL('./src/' + dir, import.meta.url))
}

function root(dir: string): string {
  return fileURLToPath(new URL('./' + dir, import.meta.url))
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    isolate: true,
    pool: 'threads',

    clearMocks: true,
    restoreMocks: true,
    unstubGlobals: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/*.test.ts',
        'src/boot/main.ts',
      ],
      thresholds: {
        branches: 85,
        functions: 90,
        lines: 90,
        statements: 90,
      },
    },

    include: ['src/**/*.test.ts'],
  },
  resolve: {
    // Keep in sync with "paths" in tsconfig.json
    alias: {
      // Test utilities only
      '$test-utils': root('test'),
      '$types': src('types'),
      '@boot': src('boot'),
      '@core': src('core'),
      '@events': src('events'),
      '@hardware': src('hardware'),
      '@logging': src('logging'),
      '@system': src('system'),
      '@utils': src('utils'),
      '@validation': src('validation'),
    },
  },
})
