import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@linkstack/contracts': path.join(root, 'packages/contracts/src/index.ts'),
      '@linkstack/graph': path.join(root, 'packages/graph/src/Graph.ts'),
      '@linkstack/composer': path.join(root, 'packages/composer/src/index.ts'),
      '@linkstack/synthesizer': path.join(root, 'packages/synthesizer/src/index.ts'),
      '@linkstack/provider-aws': path.join(root, 'providers/aws/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.spec.ts', 'providers/*/tests/**/*.spec.ts'],
    environment: 'node',
  },
});
