import { defineConfig } from 'vite'
import dts from 'vite-plugin-dts'
import { fileURLToPath } from 'node:url'

export default defineConfig({
  plugins: [
    dts({ include: ['src'] })
  ],
  build: {
    lib: {
      entry: {
        index: fileURLToPath(new URL('./src/index.ts', import.meta.url)),
        cli: fileURLToPath(new URL('./src/cli.ts', import.meta.url)),
      },
      formats: ['es'],
    },
    target: 'node20',
    rollupOptions: {
      external: [/^node:/, 'better-sqlite3', 'commander', 'dotenv', 'pino', 'pino-pretty', 'zod'],
      output: {
        banner: (chunk) => (chunk.name === 'cli' ? '#!/usr/bin/env node' : ''),
      },
    },
  },
})
