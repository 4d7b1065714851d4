import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  tsconfig: 'tsconfig.json',
  clean: true,
  splitting: false,
  sourcemap: true,
});
