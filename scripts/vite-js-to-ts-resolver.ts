import fs from 'node:fs'
import path from 'node:path'
import type { Plugin } from 'vite'

const stripQuery = (id: string): string => id.split('?', 1)[0] ?? id

/**
 * Relative imports in the sources end in `.js` (Node ESM style); map them back to the `.ts` file when no `.js`
 * file exists next to the importer.
 */
export const jsToTsResolver = (): Plugin => ({
  name: 'ladle:js-to-ts-resolver',
  enforce: 'pre',
  resolveId(source, importer) {
    if (!importer || !source.startsWith('.') || !source.endsWith('.js')) {
      return null
    }

    const resolvedJs = path.resolve(path.dirname(stripQuery(importer)), stripQuery(source))
    if (fs.existsSync(resolvedJs)) {
      return null
    }

    const base = resolvedJs.slice(0, -'.js'.length)
    for (const filePath of [`${base}.ts`, `${base}.mts`]) {
      if (fs.existsSync(filePath)) {
        return filePath
      }
    }

    return null
  },
})
