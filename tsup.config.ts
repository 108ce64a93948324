import { defineConfig } from 'tsup';

export default defineConfig({
  entry: { index: 'src/cli/index.ts' },

  format: ['esm'],

  // The workspace runtime ships as TypeScript sources, so it is bundled in
  noExternal: ['@contentflow/core'],

  sourcemap: true,
  clean: true,
  target: 'node20',
  outDir: 'dist',

  banner: {
    js: '#!/usr/bin/env node',
  },
});
