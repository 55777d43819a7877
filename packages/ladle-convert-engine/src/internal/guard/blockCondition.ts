import { lex } from '../lexer/lexer.js'
import { isIdent, isKeyword, isPunct, type Token } from '../lexer/tokens.js'
import { makeLineIndex } from '../span.js'
import { findClosing, readCall } from '../syntax/arguments.js'
import { collectOpaque, list, literal, type ValueExpr } from '../value/model.js'
import { normalizeTokens, type NormalizeContext } from '../value/normalize.js'
import { matchCommand } from './commandPatterns.js'
import { And, Bool, Compare, Not, Or, Test, Truthy, type BoolExpr, type CompareOp, type TestKind } from './model.js'

const COMPARE_OPS: ReadonlySet<string> = new Set(['==', '!=', '<', '>', '<=', '>='])

const isCompareOp = (value: string): value is CompareOp => COMPARE_OPS.has(value)

const FILE_PREDICATES: { readonly [receiver: string]: { readonly [method: string]: TestKind } } = {
  File: { 'exist?': 'path_exists', 'exists?': 'path_exists', 'file?': 'file_exists', 'directory?': 'directory_exists' },
  Dir: { 'exist?': 'directory_exists', 'exists?': 'directory_exists' },
}

const PLATFORM_PREDICATES: { readonly [name: string]: TestKind } = {
  'platform?': 'platform',
  'platform_family?': 'platform_family',
}

/**
 * Parses a guard block or branch condition into a `BoolExpr`. `undefined` when any piece falls outside the
 * recognized forms; callers then keep the whole condition opaque.
 */
export const parseCondition = (code: string, constants: ReadonlyMap<string, ValueExpr>): BoolExpr | undefined => {
  const tokens = lex(code).tokens.filter((t) => t.kind !== 'newline' && !isPunct(t, ';'))
  if (tokens.length === 0) return undefined
  const ctx: NormalizeContext = { source: '', text: code, lines: makeLineIndex(code), constants }

  const value = (run: ReadonlyArray<Token>): ValueExpr | undefined => {
    if (run.length === 0) return undefined
    const out = normalizeTokens(ctx, run)
    return collectOpaque(out.value).length > 0 ? undefined : out.value
  }

  let i = 0

  /** Tokens of one operand: up to a comparison or boolean operator at depth zero. */
  const readOperand = (): Token[] => {
    const out: Token[] = []
    while (i < tokens.length) {
      const t = tokens[i]
      if (t === undefined) break
      if (isPunct(t, '&&', '||', ')') || isKeyword(t, 'and', 'or')) break
      if (t.kind === 'punct' && isCompareOp(t.value)) break
      if (isPunct(t, '(', '[', '{')) {
        const close = findClosing(tokens, i)
        if (close === -1) return []
        out.push(...tokens.slice(i, close + 1))
        i = close + 1
        continue
      }
      out.push(t)
      i++
    }
    return out
  }

  /** `system('cmd')` or `shell_out('cmd')` with a recognized command. */
  const commandCall = (run: ReadonlyArray<Token>, name: string): BoolExpr | undefined => {
    if (!isIdent(run[0], name)) return undefined
    const call = readCall(run)
    const [arg] = call?.args ?? []
    if (call === undefined || arg === undefined || arg.kind !== 'positional' || call.args.length !== 1) return undefined
    const command = value(arg.tokens)
    return command === undefined ? undefined : matchCommand(command)
  }

  const predicate = (run: ReadonlyArray<Token>): BoolExpr | undefined => {
    const start = isPunct(run[0], '::') ? 1 : 0
    const receiver = run[start]
    const dot = run[start + 1]
    const method = run[start + 2]
    if (receiver !== undefined && receiver.kind === 'const' && isPunct(dot, '.') && method !== undefined && method.kind === 'ident') {
      const test = FILE_PREDICATES[receiver.value]?.[method.value]
      if (test === undefined) return undefined
      const call = readCall(run.slice(start + 2))
      const [arg] = call?.args ?? []
      if (call === undefined || call.trailing.length > 0 || arg === undefined || arg.kind !== 'positional') return undefined
      const subject = value(arg.tokens)
      return subject === undefined ? undefined : Test(test, subject)
    }

    const head = run[0]
    if (head !== undefined && head.kind === 'ident') {
      const platformTest = PLATFORM_PREDICATES[head.value]
      if (platformTest !== undefined) {
        const call = readCall(run)
        if (call === undefined || call.trailing.length > 0 || call.args.length === 0) return undefined
        const names: ValueExpr[] = []
        for (const arg of call.args) {
          if (arg.kind !== 'positional') return undefined
          const name = value(arg.tokens)
          if (name === undefined) return undefined
          if (name.kind === 'List') names.push(...name.items)
          else names.push(name)
        }
        const [only] = names
        return Test(platformTest, names.length === 1 && only !== undefined ? only : list(names))
      }
      if (head.value === 'system') {
        const call = readCall(run)
        return call !== undefined && call.trailing.length === 0 ? commandCall(run, 'system') : undefined
      }
    }

    const last = run[run.length - 1]
    if (isIdent(last, 'nil?') && isPunct(run[run.length - 2], '.')) {
      const subject = value(run.slice(0, -2))
      return subject === undefined ? undefined : Compare(subject, '==', literal(null))
    }
    return undefined
  }

  /** `shell_out('cmd').exitstatus == 0` and `shell_out(...).exitstatus != 0`. */
  const shellOutStatus = (left: ReadonlyArray<Token>, op: CompareOp, right: ReadonlyArray<Token>): BoolExpr | undefined => {
    const head = left[0]
    if (!isIdent(head, 'shell_out', 'shell_out!')) return undefined
    const call = readCall(left)
    if (call === undefined || !isPunct(call.trailing[0], '.') || !isIdent(call.trailing[1], 'exitstatus') || call.trailing.length !== 2) {
      return undefined
    }
    const [code] = right
    if (right.length !== 1 || code === undefined || code.kind !== 'number' || code.value !== '0') return undefined
    const matched = commandCall(left.slice(0, left.length - call.trailing.length), head.value)
    if (matched === undefined) return undefined
    if (op === '==') return matched
    return op === '!=' ? Not(matched) : undefined
  }

  const parseComparison = (): BoolExpr | undefined => {
    const left = readOperand()
    const opToken = tokens[i]
    if (opToken !== undefined && opToken.kind === 'punct' && isCompareOp(opToken.value)) {
      const op = opToken.value
      i++
      const right = readOperand()
      const shellOut = shellOutStatus(left, op, right)
      if (shellOut !== undefined) return shellOut
      const l = value(left)
      const r = value(right)
      return l === undefined || r === undefined ? undefined : Compare(l, op, r)
    }
    if (left.length === 0) return undefined
    if (left.length === 1 && isKeyword(left[0], 'true', 'false')) return Bool(isKeyword(left[0], 'true'))
    const recognized = predicate(left)
    if (recognized !== undefined) return recognized
    const v = value(left)
    return v === undefined ? undefined : Truthy(v)
  }

  const parseUnary = (): BoolExpr | undefined => {
    const t = tokens[i]
    if (isPunct(t, '!') || isKeyword(t, 'not')) {
      i++
      const inner = parseUnary()
      return inner === undefined ? undefined : Not(inner)
    }
    if (isPunct(t, '(')) {
      const close = findClosing(tokens, i)
      const after = tokens[close + 1]
      // a parenthesized group only when it is a whole operand
      if (close !== -1 && (after === undefined || isPunct(after, '&&', '||', ')') || isKeyword(after, 'and', 'or'))) {
        i++
        const inner = parseOr()
        if (!isPunct(tokens[i], ')')) return undefined
        i++
        return inner
      }
    }
    return parseComparison()
  }

  const parseAnd = (): BoolExpr | undefined => {
    const first = parseUnary()
    if (first === undefined) return undefined
    const parts = [first]
    while (isPunct(tokens[i], '&&') || isKeyword(tokens[i], 'and')) {
      i++
      const next = parseUnary()
      if (next === undefined) return undefined
      parts.push(next)
    }
    return parts.length === 1 ? first : And(parts)
  }

  const parseOr = (): BoolExpr | undefined => {
    const first = parseAnd()
    if (first === undefined) return undefined
    const parts = [first]
    while (isPunct(tokens[i], '||') || isKeyword(tokens[i], 'or')) {
      i++
      const next = parseAnd()
      if (next === undefined) return undefined
      parts.push(next)
    }
    return parts.length === 1 ? first : Or(parts)
  }

  const expr = parseOr()
  return expr !== undefined && i === tokens.length ? expr : undefined
}

/** `case` branch: `subject == v1 || subject == v2`. */
export const parseMatch = (
  subject: string,
  values: ReadonlyArray<string>,
  constants: ReadonlyMap<string, ValueExpr>,
): BoolExpr | undefined => {
  const valueOf = (code: string): ValueExpr | undefined => {
    const tokens = lex(code).tokens.filter((t) => t.kind !== 'newline')
    if (tokens.length === 0) return undefined
    const out = normalizeTokens({ source: '', text: code, lines: makeLineIndex(code), constants }, tokens)
    return collectOpaque(out.value).length > 0 ? undefined : out.value
  }
  const left = valueOf(subject)
  if (left === undefined || values.length === 0) return undefined
  const compares: BoolExpr[] = []
  for (const v of values) {
    const right = valueOf(v)
    if (right === undefined) return undefined
    compares.push(Compare(left, '==', right))
  }
  const [only] = compares
  return compares.length === 1 && only !== undefined ? only : Or(compares)
}
