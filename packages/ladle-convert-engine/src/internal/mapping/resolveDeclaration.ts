import { resolveValue, type AttributeTable } from '../attributes/table.js'
import { makeDiagnostic, type Diagnostic } from '../diagnostics.js'
import type { Guard, ResourceDeclaration } from '../extract/model.js'
import { formatResourceRef } from '../notify/targetRef.js'
import { ReasonCodes } from '../reasonCodes.js'
import type { ValueExpr } from '../value/model.js'

export type ResolvedDeclaration = {
  readonly declaration: ResourceDeclaration
  readonly diagnostics: ReadonlyArray<Diagnostic>
}

const pathText = (keys: ReadonlyArray<string>): string => `node${keys.map((k) => `['${k}']`).join('')}`

/**
 * Substitutes effective attribute values into the name, properties, command guards and notification targets.
 * Block guards and enclosing conditions keep their attribute references as variables.
 */
export const resolveDeclaration = (args: {
  readonly source: string
  readonly table: AttributeTable
  readonly declaration: ResourceDeclaration
}): ResolvedDeclaration => {
  const { source, table, declaration: decl } = args
  const unresolved = new Map<string, ReadonlyArray<string>>()
  const cycles = new Map<string, ReadonlyArray<string>>()

  const resolve = (value: ValueExpr): ValueExpr => {
    const out = resolveValue(table, value)
    for (const keys of out.unresolved) unresolved.set(keys.join('\u0000'), keys)
    for (const keys of out.cycles) cycles.set(keys.join('\u0000'), keys)
    return out.value
  }

  const declaration: ResourceDeclaration = {
    ...decl,
    nameExpression: resolve(decl.nameExpression),
    properties: decl.properties.map((p) => ({ ...p, value: resolve(p.value) })),
    guards: decl.guards.map((g): Guard => (g.form.kind === 'Command' ? { ...g, form: { kind: 'Command', command: resolve(g.form.command) } } : g)),
    notifications: decl.notifications.map((n) => ({ ...n, target: resolve(n.target) })),
  }

  const ref = formatResourceRef(declaration.type, declaration.nameExpression)
  const diagnostics: Diagnostic[] = []
  for (const keys of unresolved.values()) {
    diagnostics.push(
      makeDiagnostic({
        kind: 'UnresolvedReference',
        code: ReasonCodes.attributeUnresolved,
        message: `${pathText(keys)} has no effective value in the cookbook attributes; kept as a variable`,
        source,
        span: decl.span,
        resourceRef: ref,
      }),
    )
  }
  for (const keys of cycles.values()) {
    diagnostics.push(
      makeDiagnostic({
        kind: 'UnresolvedReference',
        code: ReasonCodes.attributeCycle,
        message: `${pathText(keys)} refers back to itself; kept as a variable`,
        source,
        span: decl.span,
        resourceRef: ref,
      }),
    )
  }
  return { declaration, diagnostics }
}
