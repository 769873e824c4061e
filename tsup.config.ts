import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
  },
  format: ['esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  target: 'node20',
  shims: true,
  // Resolved at run time through createRequire
  external: ['tree-sitter', 'tree-sitter-javascript', 'tree-sitter-python'],
});
