import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // jsdom for DOM and sessionStorage
    environment: 'jsdom',
    // stylesheet checks read files from disk; under jsdom Vite rewrites
    // `new URL(..., import.meta.url)` to an http: URL
    environmentMatchGlobs: [['src/test/app/**', 'node']],

    include: ['src/test/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    env: {
      NODE_ENV: 'test',
    },
  },

  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
});
