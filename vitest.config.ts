import { defineConfig } from 'vitest/config';

// Workspace packages resolve to their TypeScript sources
const conditions = ['source'];

export default defineConfig({
  esbuild: {
    target: 'es2022',
  },
  resolve: {
    conditions,
  },
  ssr: {
    resolve: {
      conditions,
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts'],
  },
});
