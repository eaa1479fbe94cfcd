import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const packageSource = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '*.config.ts'],
    },
  },
  resolve: {
    alias: {
      '@boxoffice/contracts': packageSource('contracts'),
      '@boxoffice/logger': packageSource('logger'),
      '@boxoffice/revenue-core': packageSource('revenue-core'),
      '@boxoffice/provider-omdb': packageSource('provider-omdb'),
      '@boxoffice/metadata-cache': packageSource('metadata-cache'),
      '@boxoffice/warehouse': packageSource('warehouse'),
      '@boxoffice/enrichment': packageSource('enrichment'),
    },
  },
});
