import { fileURLToPath } from 'url'

import { defineConfig } from 'vitest/config'

function fromRoot(relative: string): string {
  return fileURLToPath(new URL(relative, import.meta.url))
}

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
    // Mirrors the paths block in tsconfig.json
    alias: [
      { find: /^\$types\/(.*)$/, replacement: fromRoot('./src/types/$1') },
      { find: /^@boot\/(.*)$/, replacement: fromRoot('./src/boot/$1') },
      { find: /^@core\/(.*)$/, replacement: fromRoot('./src/core/$1') },
      { find: /^@features\/(.*)$/, replacement: fromRoot('./src/features/$1') },
      { find: /^@hardware\/(.*)$/, replacement: fromRoot('./src/hardware/$1') },
      { find: /^@logging$/, replacement: fromRoot('./src/logging') },
      { find: /^@system\/(.*)$/, replacement: fromRoot('./src/system/$1') },
      { find: /^@utils\/(.*)$/, replacement: fromRoot('./src/utils/$1') },
      { find: /^@validation$/, replacement: fromRoot('./src/validation') },
    ],
  },
})
