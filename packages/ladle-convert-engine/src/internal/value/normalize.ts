import { makeDiagnostic, type Diagnostic } from '../diagnostics.js'
import { lex } from '../lexer/lexer.js'
import { isIdent, isPunct, plainStringValue, type StringToken, type Token } from '../lexer/tokens.js'
import { ReasonCodes } from '../reasonCodes.js'
import { spanOfRange, type LineIndex, type Span } from '../span.js'
import { findClosing, splitTopLevel, toArguments } from '../syntax/arguments.js'
import { sourceOf } from '../syntax/statements.js'
import {
  attributePath,
  interpolation,
  isAttributeScope,
  list,
  literal,
  map,
  opaque,
  symbol,
  type AttributeScope,
  type MapEntry,
  type ValueExpr,
} from './model.js'

export type NormalizeContext = {
  readonly source: string
  /** Full text the token offsets point into. */
  readonly text: string
  readonly lines: LineIndex
  /** Recipe-level constants (`NAME = 'x'`) visible at this point. */
  readonly constants: ReadonlyMap<string, ValueExpr>
}

export type Normalized = {
  readonly value: ValueExpr
  readonly diagnostics: ReadonlyArray<Diagnostic>
}

/** Attribute precedence levels reachable as `node.<level>[...]`. */
const NODE_LEVELS: ReadonlySet<string> = new Set([
  'default',
  'force_default',
  'normal',
  'override',
  'force_override',
  'automatic',
  'set',
])

/** Method names that end an attribute path instead of naming a key (`node['a'].to_s`). */
const VALUE_METHODS: ReadonlySet<string> = new Set([
  'to_s',
  'to_i',
  'to_f',
  'to_a',
  'to_h',
  'to_sym',
  'join',
  'split',
  'strip',
  'upcase',
  'downcase',
  'keys',
  'values',
  'each',
  'map',
  'first',
  'last',
  'size',
  'length',
  'merge',
  'fetch',
  'dig',
])

type OpaqueReason =
  | typeof ReasonCodes.valueUnrecognized
  | typeof ReasonCodes.valueLazy
  | typeof ReasonCodes.valueUnknownConstant

type Parse = { readonly value: ValueExpr; readonly next: number }

/** `[key]` and `.key` accessors after an attribute root; `undefined` when a key is dynamic. */
export const readKeys = (args: {
  readonly tokens: ReadonlyArray<Token>
  readonly from: number
  readonly allowDotted: boolean
  readonly constants: ReadonlyMap<string, ValueExpr>
}): { readonly keys: ReadonlyArray<string>; readonly next: number } | undefined => {
  const { tokens: run, from, allowDotted } = args
  const keys: string[] = []
  let k = from
  while (k < run.length) {
    const t = run[k]
    if (isPunct(t, '[') && t !== undefined && !t.spaceBefore) {
      const key = run[k + 1]
      if (!isPunct(run[k + 2], ']') || key === undefined) return undefined
      if (key.kind === 'string' && key.flavor !== 'backtick') {
        const text = plainStringValue(key)
        if (text === undefined) return undefined
        keys.push(text)
      } else if (key.kind === 'symbol' || key.kind === 'number' || key.kind === 'ident' || key.kind === 'const') {
        if (key.kind === 'ident' || key.kind === 'const') {
          const constant = args.constants.get(key.value)
          if (constant === undefined || constant.kind !== 'Literal') return undefined
          keys.push(String(constant.value))
        } else {
          keys.push(key.value)
        }
      } else {
        return undefined
      }
      k += 3
      continue
    }
    if (allowDotted && isPunct(t, '.')) {
      const key = run[k + 1]
      if (key === undefined || key.kind !== 'ident' || VALUE_METHODS.has(key.value) || /[?!]$/.test(key.value)) break
      if (isPunct(run[k + 2], '(')) break
      keys.push(key.value)
      k += 2
      continue
    }
    break
  }
  return { keys, next: k }
}

/** Integers past 2^53 keep their digits as a string instead of rounding. */
const numberValue = (digits: string, negative: boolean): ValueExpr | undefined => {
  const n = Number(digits)
  if (!Number.isFinite(n)) return undefined
  if (/^\d+$/.test(digits) && !Number.isSafeInteger(n)) return literal(negative ? `-${digits}` : digits)
  return literal(negative ? -n : n)
}

/**
 * Converts a run of tokens into a `ValueExpr`. Never throws: anything outside the recognized productions becomes
 * `Opaque` holding the exact source text, with a warning.
 */
export const normalizeTokens = (ctx: NormalizeContext, tokens: ReadonlyArray<Token>): Normalized => {
  const diagnostics: Diagnostic[] = []

  const rawOf = (run: ReadonlyArray<Token>): string => sourceOf(ctx.text, run)

  const spanOf = (run: ReadonlyArray<Token>): Span => {
    const first = run[0]
    const last = run[run.length - 1]
    return spanOfRange(ctx.lines, first?.start ?? 0, last?.end ?? first?.start ?? 0)
  }

  const giveUp = (run: ReadonlyArray<Token>, code: OpaqueReason): ValueExpr => {
    const raw = rawOf(run)
    const message =
      code === ReasonCodes.valueLazy
        ? `lazy value '${raw}' is evaluated at converge time and was kept as-is`
        : code === ReasonCodes.valueUnknownConstant
          ? `constant '${raw}' is not defined in this file and was kept as-is`
          : `unrecognized expression '${raw}' was kept as-is`
    diagnostics.push(
      makeDiagnostic({
        kind: code === ReasonCodes.valueUnknownConstant ? 'UnresolvedReference' : 'UnrecognizedConstruct',
        code,
        message,
        source: ctx.source,
        span: spanOf(run),
      }),
    )
    return opaque(raw)
  }

  const parseString = (token: StringToken): ValueExpr => {
    if (token.flavor === 'backtick') return giveUp([token], ReasonCodes.valueUnrecognized)
    const hasCode = token.parts.some((p) => p.kind === 'code')
    if (!hasCode) {
      const text = token.parts.map((p) => (p.kind === 'text' ? p.value : '')).join('')
      return token.flavor === 'symbol' ? symbol(text) : literal(text)
    }
    const segments: ValueExpr[] = []
    for (const part of token.parts) {
      if (part.kind === 'text') {
        segments.push(literal(part.value))
        continue
      }
      const inner = lex(part.source, part.offset).tokens.filter((t) => t.kind !== 'newline')
      if (inner.length === 0) continue
      segments.push(parseWhole(inner))
    }
    return interpolation(segments)
  }

  const parseAttributeRoot = (run: ReadonlyArray<Token>, at: number, root: string): Parse | undefined => {
    let scope: AttributeScope
    let from = at + 1
    if (root === 'node') {
      scope = 'node'
      const dot = run[from]
      const level = run[from + 1]
      if (isPunct(dot, '.') && level !== undefined && level.kind === 'ident' && NODE_LEVELS.has(level.value)) {
        scope = isAttributeScope(level.value) ? level.value : 'node'
        from += 2
      }
    } else if (isAttributeScope(root)) {
      scope = root
    } else {
      return undefined
    }
    const read = readKeys({ tokens: run, from, allowDotted: scope === 'node' || scope === 'new_resource', constants: ctx.constants })
    if (read === undefined || read.keys.length === 0) return undefined
    return { value: attributePath(scope, read.keys), next: read.next }
  }

  const parseHash = (run: ReadonlyArray<Token>, at: number): Parse | undefined => {
    const close = findClosing(run, at)
    if (close === -1) return undefined
    const entries = parseEntries(run.slice(at + 1, close))
    return entries === undefined ? undefined : { value: map(entries), next: close + 1 }
  }

  const parseEntries = (run: ReadonlyArray<Token>): MapEntry[] | undefined => {
    const entries: MapEntry[] = []
    for (const arg of toArguments(splitTopLevel(run))) {
      if (arg.kind !== 'keyword') return undefined
      entries.push({ key: arg.key, value: parseWhole(arg.tokens) })
    }
    return entries
  }

  const parsePrimary = (run: ReadonlyArray<Token>, at: number): Parse | undefined => {
    const t = run[at]
    if (t === undefined) return undefined
    switch (t.kind) {
      case 'string':
        return { value: parseString(t), next: at + 1 }
      case 'symbol':
        return { value: symbol(t.value), next: at + 1 }
      case 'number': {
        const digits = t.value.replace(/_/g, '')
        // leading-zero integers are file modes; keep their spelling
        if (/^0[0-7]+$/.test(digits)) return { value: literal(digits), next: at + 1 }
        const value = numberValue(digits, false)
        return value !== undefined ? { value, next: at + 1 } : undefined
      }
      case 'words':
        return { value: list(t.words.map((w) => (t.symbols ? symbol(w) : literal(w)))), next: at + 1 }
      case 'keyword':
        if (t.value === 'true') return { value: literal(true), next: at + 1 }
        if (t.value === 'false') return { value: literal(false), next: at + 1 }
        if (t.value === 'nil') return { value: literal(null), next: at + 1 }
        return undefined
      case 'const': {
        if (isPunct(run[at + 1], '.', '::', '(')) return undefined
        const constant = ctx.constants.get(t.value)
        return constant !== undefined ? { value: constant, next: at + 1 } : undefined
      }
      case 'ident': {
        const local = ctx.constants.get(t.value)
        if (local !== undefined && !isPunct(run[at + 1], '(', '.', '&.', '[')) return { value: local, next: at + 1 }
        return parseAttributeRoot(run, at, t.value)
      }
      case 'punct': {
        if (t.value === '-') {
          const num = run[at + 1]
          if (num !== undefined && num.kind === 'number' && !num.spaceBefore) {
            const value = numberValue(num.value.replace(/_/g, ''), true)
            return value !== undefined ? { value, next: at + 2 } : undefined
          }
          return undefined
        }
        if (t.value === '[') {
          const close = findClosing(run, at)
          if (close === -1) return undefined
          const items = splitTopLevel(run.slice(at + 1, close))
            .filter((piece) => piece.length > 0)
            .map((piece) => parseWhole(piece))
          return { value: list(items), next: close + 1 }
        }
        if (t.value === '{') return parseHash(run, at)
        if (t.value === '(') {
          const close = findClosing(run, at)
          if (close === -1 || close === at + 1) return undefined
          return { value: parseWhole(run.slice(at + 1, close)), next: close + 1 }
        }
        return undefined
      }
      default:
        return undefined
    }
  }

  const parseWhole = (run: ReadonlyArray<Token>): ValueExpr => {
    const mark = diagnostics.length
    const first = run[0]
    if (isIdent(run[0], 'lazy')) return giveUp(run, ReasonCodes.valueLazy)
    if (run.length === 1 && first !== undefined && first.kind === 'const' && !ctx.constants.has(first.value)) {
      return giveUp(run, ReasonCodes.valueUnknownConstant)
    }
    // bare `key: value` pairs (hash without braces)
    const args = toArguments(splitTopLevel(run))
    if (args.length > 0 && args.every((a) => a.kind === 'keyword')) {
      const entries = parseEntries(run)
      if (entries !== undefined) return map(entries)
    }
    const parsed = parsePrimary(run, 0)
    if (parsed !== undefined && parsed.next === run.length) return parsed.value
    // only the outermost expression is reported
    diagnostics.length = mark
    return giveUp(run, ReasonCodes.valueUnrecognized)
  }

  if (tokens.length === 0) return { value: literal(null), diagnostics }
  const value = parseWhole(tokens)
  return { value, diagnostics }
}
