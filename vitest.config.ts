import { defineConfig } from 'vitest/config'

export default defineConfig({
  resolve: {
    // koishi's ESM build fails to load under vite-node; use the CommonJS entry.
    alias: {
      koishi: require.resolve('koishi'),
    },
  },
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
  },
})
