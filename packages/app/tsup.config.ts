import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/main.ts', 'src/repl.ts'],
  format: ['esm'],
  dts: true,
  clean: true,
  sourcemap: true,
  // Workspace packages export TypeScript sources, so they are bundled in.
  noExternal: [/^@agentnet\//],
});
