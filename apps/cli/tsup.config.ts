import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  clean: true,
  splitting: false,
  treeshake: true,
  // workspace packages export TypeScript sources, so they are bundled in
  noExternal: [/^@ydel\//],
});
