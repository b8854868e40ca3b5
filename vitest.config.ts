import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolvePackage = (entry: string): string => fileURLToPath(new URL(entry, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@stack-pool/core': resolvePackage('./packages/core/src/index.ts'),
      '@stack-pool/react': resolvePackage('./packages/react/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
  },
});
