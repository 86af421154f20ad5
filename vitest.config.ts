import path from 'node:path';
import { defineConfig } from 'vitest/config';

const packages = ['model', 'parser', 'hierarchy', 'emitter', 'cli'];

export default defineConfig({
  resolve: {
    alias: Object.fromEntries(packages.map((name) => [`@infragram/${name}`, path.resolve(__dirname, `packages/${name}/src/index.ts`)])),
  },
  test: {
    include: ['packages/*/tests/**/*.spec.ts'],
    environment: 'node',
  },
});
