import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['bin/extract-stats.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
});
