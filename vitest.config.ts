import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const packageSource = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@rowmux/core': packageSource('core'),
      '@rowmux/mysql': packageSource('mysql'),
      '@rowmux/postgresql': packageSource('postgresql'),
      '@rowmux/sqlite': packageSource('sqlite'),
      '@rowmux/redis': packageSource('redis'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
