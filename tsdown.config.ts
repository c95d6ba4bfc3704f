import { defineConfig } from 'tsdown';

export default defineConfig({
  // flat names: the thread runner looks for worker.js beside the bundle
  entry: {
    index: 'src/index.ts',
    server: 'src/server.ts',
    worker: 'src/stream/worker.ts',
  },
  format: ['esm'],
  dts: true,
  clean: true,
  outDir: 'dist',
  outputOptions: {
    entryFileNames: '[name].js',
  },
});
