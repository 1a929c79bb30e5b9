import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    'cli/index': 'src/cli/index.ts',
    index: 'src/index.ts',
  },
  format: ['esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  target: 'node20',
  splitting: true,
  banner: {
    // Shebang for the CLI entry point; harmless on the library chunks
    js: '#!/usr/bin/env node',
  },
});
