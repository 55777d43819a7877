import { makeDiagnostic, type Diagnostic } from './internal/diagnostics.js'
import { lex } from './internal/lexer/lexer.js'
import { isNewline } from './internal/lexer/tokens.js'
import { makeLineIndex, spanAtOffset } from './internal/span.js'
import type { ValueExpr } from './internal/value/model.js'
import { normalizeTokens, type Normalized } from './internal/value/normalize.js'

export type {
  AttributePathValue,
  AttributeScope,
  InterpolationValue,
  ListValue,
  LiteralValue,
  MapEntry,
  MapValue,
  OpaqueValue,
  Scalar,
  TaskValue,
  ValueExpr,
} from './internal/value/model.js'
export type { Normalized } from './internal/value/normalize.js'
export {
  attributePath,
  collectOpaque,
  interpolation,
  list,
  literal,
  literalString,
  map,
  opaque,
  symbol,
} from './internal/value/model.js'
export { render, renderExpression, toTaskValue, variableName } from './internal/value/render.js'

export type NormalizeOptions = {
  readonly source?: string
  /** Constants and locals visible to the expression. */
  readonly constants?: ReadonlyMap<string, ValueExpr>
}

/** Expression text (one value, possibly spanning lines for heredocs) to a `ValueExpr`. */
export const normalize = (text: string, options: NormalizeOptions = {}): Normalized => {
  const source = options.source ?? ''
  const lines = makeLineIndex(text)
  const lexed = lex(text)
  const tokens = lexed.tokens.filter((t) => !isNewline(t))
  const structural: Diagnostic[] = lexed.problems.map((p) =>
    makeDiagnostic({ kind: 'StructuralParseError', code: p.code, message: p.message, source, span: spanAtOffset(lines, p.offset) }),
  )
  const out = normalizeTokens({ source, text, lines, constants: options.constants ?? new Map() }, tokens)
  return { value: out.value, diagnostics: [...structural, ...out.diagnostics] }
}
