import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const resolvePath = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@banksync/types': resolvePath('./packages/types/src/index.ts'),
      '@banksync/plaid-bridge': resolvePath('./packages/plaid-bridge/src/index.ts'),
      '@banksync/store': resolvePath('./packages/store/src/index.ts'),
      '@banksync/sync': resolvePath('./packages/sync/src/index.ts'),
      '@banksync/api': resolvePath('./apps/api/src/index.ts'),
      '@banksync/cli': resolvePath('./apps/cli/src/program.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
