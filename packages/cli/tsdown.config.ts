import { defineConfig } from 'tsdown';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  clean: true,
  outDir: 'dist',
  // Workspace packages ship TypeScript sources; bundle them into the bin
  noExternal: [/^@retrykit\//]
});
