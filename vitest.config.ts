import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolvePackage = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@tradegate/types': resolvePackage('./packages/types/src/index.ts'),
      '@tradegate/utils': resolvePackage('./packages/utils/src/index.ts'),
      '@tradegate/exchange': resolvePackage('./packages/exchange/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
