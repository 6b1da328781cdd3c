import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

// Workspace packages resolve to their TypeScript sources, so tests need no build.
export default defineConfig({
  resolve: {
    alias: {
      '@bulwark/kernel': source('./packages/kernel/src/index.ts'),
      '@bulwark/runtime-host': source('./packages/runtime-host/src/index.ts'),
      '@bulwark/command-filesystem': source('./modules/first-party/filesystem/src/index.ts'),
      '@bulwark/command-shell': source('./modules/first-party/shell/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts', 'modules/first-party/*/test/**/*.test.ts'],
    environment: 'node',
  },
});
