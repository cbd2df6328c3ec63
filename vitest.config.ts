import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string) =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@hardline/core': pkg('core'),
      '@hardline/transport-ssh': pkg('transport-ssh'),
      '@hardline/transport-local': pkg('transport-local'),
      '@hardline/sdk': pkg('sdk'),
      '@hardline/cli': pkg('cli'),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    testTimeout: 15000,
  },
});
