import type { AttributeAssignment } from '../attributes/model.js'
import { parseAttributeFile, type AssignedPaths } from '../attributes/parseAttributeFile.js'
import { resolve } from '../attributes/resolve.js'
import { makeTable, type AttributeTable } from '../attributes/table.js'
import type { Diagnostic } from '../diagnostics.js'
import type { ResourceDefinition } from '../schema/model.js'
import { parseResourceDefinition } from '../schema/parseDefinition.js'
import type { ResourceSource, SourceText } from './model.js'

export type PreparedCookbook = {
  readonly attributes: AttributeTable
  /** By type name; the first file providing a name wins. */
  readonly definitions: ReadonlyMap<string, ResourceDefinition>
  readonly diagnostics: ReadonlyArray<Diagnostic>
}

/** `resources/site.rb` in cookbook `web` provides `web_site`. */
export const fileTypeName = (cookbookName: string, source: string): string | undefined => {
  const base = source.split(/[\\/]/).pop()?.replace(/\.rb$/, '')
  return base === undefined || base.length === 0 ? undefined : `${cookbookName}_${base}`
}

export const prepareCookbook = (args: {
  readonly cookbookName?: string
  readonly attributeFiles: ReadonlyArray<SourceText>
  readonly resourceFiles: ReadonlyArray<ResourceSource>
}): PreparedCookbook => {
  const assignments: AttributeAssignment[] = []
  const diagnostics: Diagnostic[] = []

  // one index sequence and one set of assigned paths across files: later files win ties, `*_unless` sees earlier files
  const assigned: AssignedPaths = new Set()
  for (const file of args.attributeFiles) {
    const parsed = parseAttributeFile({ source: file.source, text: file.text, startIndex: assignments.length, assigned })
    assignments.push(...parsed.assignments)
    diagnostics.push(...parsed.diagnostics)
  }

  const definitions = new Map<string, ResourceDefinition>()
  for (const file of args.resourceFiles) {
    const derived = args.cookbookName !== undefined ? fileTypeName(args.cookbookName, file.source) : undefined
    const typeNames = file.typeNames ?? (derived !== undefined ? [derived] : [])
    const definition = parseResourceDefinition({ text: file.text, source: file.source, typeNames })
    diagnostics.push(...definition.diagnostics)
    for (const name of definition.typeNames) {
      if (!definitions.has(name)) definitions.set(name, definition)
    }
  }

  return { attributes: makeTable(resolve(assignments)), definitions, diagnostics }
}
