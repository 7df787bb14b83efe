import { defineConfig } from 'tsdown'

export default defineConfig([
  // CLI binary: dist/cli.mjs (standalone, bundles all pure-JS deps)
  // noExternal ensures @reposieve/* workspace packages are bundled inline (private, not on npm)
  {
    entry: { cli: './packages/cli/src/cli.ts' },
    format: 'esm',
    platform: 'node',
    dts: false,
    clean: true,
    outDir: 'dist',
    noExternal: [/^@reposieve\//],
  },
])
