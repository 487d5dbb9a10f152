import { defineConfig } from 'tsup'

export default defineConfig({
  entry: {
    'bin/run': 'bin/run.ts',
    'src/index': 'src/index.ts',
  },
  format: ['cjs'],
  dts: { entry: { 'src/index': 'src/index.ts' } },
  splitting: false,
  sourcemap: false,
  clean: true,
  target: 'node20',
})
