import { defineConfig } from 'tsup';

// ESM only: the package is "type": "module" and targets Node.js 20
export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  clean: true,
  dts: true,
});
