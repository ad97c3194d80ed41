import { defineConfig, type Options } from 'tsup';

export const actionBundleOptions: Options = {
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  dts: false,
  splitting: false,
  sourcemap: true,
  clean: true,
  // The Actions runner executes dist/index.js without installing node_modules
  noExternal: [/.*/],
  // Inlined CommonJS dependencies (@actions/core) call require for node built-ins
  banner: {
    js: `import { createRequire as __createRequire } from 'module';
const require = __createRequire(import.meta.url);`,
  },
};

export default defineConfig(actionBundleOptions);
