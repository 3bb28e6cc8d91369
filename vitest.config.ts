import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const dir = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@interp-core': dir('./packages/interp-core/src'),
      '@num-core': dir('./packages/num-core/src'),
    }
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts', 'apps/*/tests/**/*.test.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**'
    ]
  },
});
