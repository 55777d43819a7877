import type { ResourceDeclaration } from '../../src/Recipe.js'
import type { Span } from '../../src/Diagnostics.js'
import { literal } from '../../src/Value.js'

export const span: Span = {
  start: { line: 1, column: 1, offset: 0 },
  end: { line: 1, column: 1, offset: 0 },
}

/** A declaration as the extractor would produce it, with only the fields under test filled in. */
export const declaration = (
  type: string,
  name: string,
  overrides: Partial<Omit<ResourceDeclaration, 'type'>> = {},
): ResourceDeclaration => ({
  type,
  nameExpression: literal(name),
  actions: [],
  properties: [],
  guards: [],
  notifications: [],
  context: [],
  loop: false,
  malformed: false,
  usesSearch: false,
  span,
  source: 'recipes/default.rb',
  ...overrides,
})
