import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  splitting: false,
  minify: false,
  // pako stays a runtime dependency
  external: ['pako'],
  esbuildOptions(options) {
    options.platform = 'neutral';
  },
});
