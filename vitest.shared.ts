import { fileURLToPath } from 'node:url'

import { jsToTsResolver } from './scripts/vite-js-to-ts-resolver.js'

export const sharedConfig = {
  plugins: [jsToTsResolver()],
  test: {
    alias: {
      // point package imports at the sources so tests never need a build
      '@ladle/convert-engine': fileURLToPath(new URL('./packages/ladle-convert-engine/src/index.ts', import.meta.url)),
    },
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
}
