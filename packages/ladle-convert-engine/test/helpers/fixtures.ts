import fs from 'node:fs'
import { fileURLToPath } from 'node:url'

import type { SourceText } from '../../src/Convert.js'

const fixturesRoot = fileURLToPath(new URL('../fixtures/', import.meta.url))

export const readFixture = (relativePath: string): SourceText => ({
  source: relativePath,
  text: fs.readFileSync(`${fixturesRoot}${relativePath}`, 'utf8'),
})
