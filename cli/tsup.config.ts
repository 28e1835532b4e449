import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/cli.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  outDir: 'dist',
  tsconfig: '../tsconfig.build.json',
  // The workspace core package exports TypeScript sources, so it is bundled into the binary.
  noExternal: ['@hexlines/core'],
});
