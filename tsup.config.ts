import { defineConfig } from 'tsup';

export default defineConfig([
  {
    entry: ['src/index.ts'],
    format: ['esm'],
    dts: true,
    sourcemap: true,
    clean: true,
    target: 'node20',
    splitting: false,
    outDir: 'dist/bundle',
    external: ['@libsql/client'],
  },
  {
    entry: ['bin/vitalsense.ts'],
    format: ['esm'],
    sourcemap: true,
    target: 'node20',
    splitting: false,
    outDir: 'dist/bundle/bin',
    external: ['@libsql/client'],
  },
]);
