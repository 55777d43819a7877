import type { ResourceDeclaration } from '../extract/model.js'
import { containsOpaque, type BoolExpr } from '../guard/model.js'
import { collectOpaque } from '../value/model.js'
import type { Complexity } from './model.js'

/**
 * complex: needs a human (opaque code, loops, search, placeholder module, broken block);
 * moderate: guarded, notifying or custom; simple: everything else.
 */
export const estimateComplexity = (args: {
  readonly declaration: ResourceDeclaration
  readonly condition: BoolExpr | undefined
  readonly fallback: boolean
  readonly custom: boolean
}): Complexity => {
  const { declaration: decl, condition } = args
  const opaque =
    collectOpaque(decl.nameExpression).length > 0 ||
    decl.properties.some((p) => collectOpaque(p.value).length > 0) ||
    (condition !== undefined && containsOpaque(condition))
  if (opaque || args.fallback || decl.loop || decl.malformed || decl.usesSearch) return 'complex'
  if (condition !== undefined || decl.notifications.length > 0 || args.custom) return 'moderate'
  return 'simple'
}
