import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['packages/index.ts'],
  format: ['cjs'],
  dts: false,
  shims: true,
  splitting: false,
  external: ['chevrotain'],
  outDir: 'dist',
});
