import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/main.ts', 'src/providers/cloudflare.ts'],
  format: ['esm'],
  target: 'node20',
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true,
  minify: false,
});
