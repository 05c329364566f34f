import { defineConfig } from 'tsup'
import type { Options } from 'tsup'

// The workspace core exports TypeScript sources, so it is bundled in.
// Its own dependencies stay external and are declared by this package.
export const cliBuild: Options = {
  entry: ['src/bin.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  sourcemap: true,
  clean: true,
  noExternal: ['zsk-roller'],
  banner: {
    js: '#!/usr/bin/env node',
  },
}

export default defineConfig(cliBuild)
