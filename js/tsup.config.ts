import { defineConfig } from 'tsup';

export default defineConfig({
  format: ['esm', 'cjs'],

  // Declarations come from `tsc -p tsconfig.build.json`
  dts: false,

  clean: true,
  splitting: false,
  bundle: true,
  sourcemap: true,
  target: 'es2022',

  minify: process.env.NODE_ENV === 'production',
  treeshake: true,

  // Relative to the package being built
  entry: ['src/index.ts'],
  outDir: 'dist',

  platform: 'node',

  external: [
    'node:*',
    '@noble/hashes',
    'uuid',
    'zod',
    // One copy of the logger configuration across packages
    '@txgen/utils',
    '@txgen/consensus',
    '@txgen/utxo',
  ],

  define: {
    'process.env.NODE_ENV': JSON.stringify(process.env.NODE_ENV || 'development'),
  },

  keepNames: true,
});
