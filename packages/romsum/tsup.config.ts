import { defineConfig } from 'tsup';

export default defineConfig([
  {
    entry: ['src/index.ts', 'src/cli.ts'],
    format: ['esm'],
    outDir: 'dist',
    sourcemap: true,
    dts: true,
    splitting: true,
    platform: 'node',
    target: 'node20',
    // Bundled from its sources
    noExternal: ['@romsum/checksum'],
    external: ['node:fs', 'node:fs/promises', 'node:stream', 'node:util'],
    esbuildOptions: (options) => {
      options.conditions = ['source'];
    },
  },
]);
