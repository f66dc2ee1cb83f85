import { defineConfig, type Options } from 'tsup'

const sharedConfig: Partial<Options> = {
  format: ['esm'],
  sourcemap: false,
  splitting: false,
  treeshake: true,
  target: 'node20',
  external: [
    'better-sqlite3',
    'commander',
    'drizzle-orm',
    'zod',
  ],
}

export default defineConfig([
  // Library entry — engine + types
  {
    ...sharedConfig,
    entry: { index: 'src/index.ts' },
    dts: true,
    clean: true,
  },
  // CLI entry — the shebang in src/bin.ts is carried into the bundle
  {
    ...sharedConfig,
    entry: { bin: 'src/bin.ts' },
    dts: false,
    clean: false,
  },
])
