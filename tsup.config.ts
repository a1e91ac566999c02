import { defineConfig } from 'tsup';
import { chmodSync, existsSync } from 'fs';

export default defineConfig({
  entry: {
    ipcd: 'src/ipcd.ts',
    'ipc/index': 'src/ipc/index.ts',
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
    console.log('✅ Build complete!');

    // Set executable permissions for the CLI entrypoint
    if (existsSync('dist/ipcd.js')) {
      chmodSync('dist/ipcd.js', 0o755);
    }
  },
});
