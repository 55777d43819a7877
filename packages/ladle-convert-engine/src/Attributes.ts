export type { AttributeAssignment, EffectiveAttribute, Precedence } from './internal/attributes/model.js'
export { PRECEDENCES, PrecedenceRank, isPrecedence, keyPathId } from './internal/attributes/model.js'
export type { AssignedPaths, AttributeFileResult, ParseAttributeFileArgs } from './internal/attributes/parseAttributeFile.js'
export { parseAttributeFile } from './internal/attributes/parseAttributeFile.js'
export { resolve } from './internal/attributes/resolve.js'
export type { AttributeTable, ResolvedValue } from './internal/attributes/table.js'
export { makeTable, resolveValue } from './internal/attributes/table.js'
