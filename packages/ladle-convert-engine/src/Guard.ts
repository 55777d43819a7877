export type { BoolExpr, CompareOp, TestKind } from './internal/guard/model.js'
export { And, Bool, Compare, Not, OpaqueBool, Or, Test, Truthy, allOf, containsOpaque } from './internal/guard/model.js'
export type { TranslateOptions, Translated } from './internal/guard/translate.js'
export { translate, translateContext } from './internal/guard/translate.js'
export { matchCommand } from './internal/guard/commandPatterns.js'
export { parseCondition } from './internal/guard/blockCondition.js'
export { renderWhen as render } from './internal/guard/render.js'
