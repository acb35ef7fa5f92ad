import { fileURLToPath } from 'url';
import { resolve } from 'path';
import { defineConfig } from 'vitest/config';

const here = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  root: resolve(here, '..', '..'),
  resolve: {
    alias: {
      '@voicebox/core': resolve(here, '../core/src/index.ts'),
      '@voicebox/platform-macos': resolve(here, '../platform-macos/src/index.ts'),
      '@voicebox/platform-linux': resolve(here, '../platform-linux/src/index.ts'),
      '@voicebox/platform': resolve(here, '../platform/src/index.ts'),
    },
  },
  test: {
    include: ['packages/test-harness/src/**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json-summary'],
      all: true,
      include: [
        'packages/core/src/**/*.ts',
        'packages/platform*/src/**/*.ts',
        'apps/voicebox/src/main/**/*.ts',
      ],
      exclude: ['apps/voicebox/src/main/index.ts'],
    },
  },
});
