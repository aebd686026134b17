import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const pkg = (name: string): string => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@stmtlens/types': pkg('types'),
      '@stmtlens/analytics': pkg('analytics'),
      '@stmtlens/orientation': pkg('orientation'),
      '@stmtlens/document-loader': pkg('document-loader'),
      '@stmtlens/pipeline': pkg('pipeline'),
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
