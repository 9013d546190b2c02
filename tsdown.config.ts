import { defineConfig } from 'tsdown'

export default defineConfig({
  entry: 'src/index.ts',
  format: ['esm', 'cjs'],
  target: ['node20'],
  dts: true,
  sourcemap: true,
  outDir: 'dist',
  clean: true,
  platform: 'node',
})
