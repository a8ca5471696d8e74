import { fileURLToPath } from 'node:url'

import { defineConfig } from 'vitest/config'

function fromRoot(relative: string): string {
  return fileURLToPath(new URL(relative, import.meta.url))
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    isolate: true,              // Each test file in separate worker
    pool: 'threads',

    // Mock cleanup settings
    mockReset: true,
    clearMocks: true,
    restoreMocks: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        '**/*.test.ts',
        '**/*.config.ts',
        'coverage/**',
        'dist/**',
        'src/boot/main.ts',
        'tools/intime-ctl/ctl.ts',
      ],
    },

    include: ['src/**/*.test.ts', 'tools/**/*.test.ts'],
  },
  resolve: {
    // Mirrors compilerOptions.paths in tsconfig.json
    alias: {
      '@boot': fromRoot('./src/boot'),
      '@core': fromRoot('./src/core'),
      '@system': fromRoot('./src/system'),
      '@hardware': fromRoot('./src/hardware'),
      '@logging': fromRoot('./src/logging'),
      '@validation': fromRoot('./src/validation'),
      '@utils': fromRoot('./src/utils'),
      '$types': fromRoot('./src/types'),
    },
  },
})
