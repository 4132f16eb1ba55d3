import { defineConfig } from 'tsup';

export default defineConfig([
  {
    entry: ['src/cli.ts'],
    format: ['esm'],
    target: 'node20',
    platform: 'node',
    banner: {
      js: '#!/usr/bin/env node',
    },
    outDir: 'dist',
    clean: true,
    sourcemap: true,
  },
  {
    // chalk, nanoid and ora are ESM-only, so the library ships ESM only.
    entry: ['src/index.ts'],
    format: ['esm'],
    target: 'node20',
    platform: 'node',
    dts: true,
    outDir: 'dist',
    sourcemap: true,
  },
]);
