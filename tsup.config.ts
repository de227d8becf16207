import { defineConfig } from 'tsup';
import { chmodSync, existsSync } from 'fs';

export default defineConfig({
  entry: {
    stagehub: 'src/stagehub.ts',
  },
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  outDir: 'dist',
  clean: true,
  sourcemap: true,
  splitting: false,
  shims: false,
  treeshake: true,
  minify: false,
  onSuccess: async () => {
    console.log('Build complete');

    // The daemon re-executes this file, so it must stay executable
    if (existsSync('dist/stagehub.js')) {
      chmodSync('dist/stagehub.js', 0o755);
    }
  },
});
