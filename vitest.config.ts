import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const resolveLocal = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  define: {
    __CLI_VERSION__: JSON.stringify('0.1.0'),
  },
  resolve: {
    alias: [
      { find: /^pkglist-shared\/testing$/, replacement: resolveLocal('./pkglist-shared/src/testing/fixtures.ts') },
      { find: /^pkglist-shared$/, replacement: resolveLocal('./pkglist-shared/src/index.ts') },
    ],
  },
  test: {
    include: ['pkglist-shared/src/**/*.test.ts', 'pkglist-cli/src/**/*.test.ts', 'pkglist-cli/src/**/*.test.tsx'],
    environment: 'node',
  },
});
