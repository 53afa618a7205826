import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@movegrade/core': path.resolve(root, 'packages/core/src/index.ts'),
      '@movegrade/pgn': path.resolve(root, 'packages/pgn/src/index.ts'),
      '@movegrade/database': path.resolve(root, 'packages/database/src/index.ts'),
      '@movegrade/engine': path.resolve(root, 'packages/engine/src/index.ts'),
      '@movegrade/test-utils': path.resolve(root, 'packages/test-utils/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 30000,
  },
});
