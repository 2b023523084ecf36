import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@irkit/ir': pkg('ir'),
      '@irkit/immutable': pkg('immutable'),
      '@irkit/patterns': pkg('patterns'),
      '@irkit/rewrite': pkg('rewrite'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts', 'test/**/*.test.ts'],
    environment: 'node',
  },
});
