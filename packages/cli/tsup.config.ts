import { fileURLToPath } from 'node:url'
import { defineConfig } from 'tsup'
import type { Options } from 'tsup'

/**
 * Self-contained `scantoken` executable. Workspace packages export their
 * TypeScript sources, so they are bundled in; npm dependencies stay external.
 */
export const binConfig: Options = {
  entry: { bin: fileURLToPath(new URL('./src/bin.ts', import.meta.url)) },
  outDir: fileURLToPath(new URL('./dist', import.meta.url)),
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  splitting: false,
  sourcemap: true,
  clean: true,
  dts: false,
  noExternal: [/^@scantoken\//],
}

export default defineConfig(binConfig)
