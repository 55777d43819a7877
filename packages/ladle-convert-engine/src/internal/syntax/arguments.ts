import { isPunct, plainStringValue, type Token } from '../lexer/tokens.js'

export type PositionalArgument = {
  readonly kind: 'positional'
  readonly tokens: ReadonlyArray<Token>
}

export type KeywordArgument = {
  readonly kind: 'keyword'
  readonly key: string
  readonly keyToken: Token
  readonly tokens: ReadonlyArray<Token>
}

export type Argument = PositionalArgument | KeywordArgument

export type CallShape = {
  /** Method name (first token). */
  readonly name: Token
  readonly args: ReadonlyArray<Argument>
  /** Tokens after a closing parenthesis of a parenthesized call (`foo(x).bar`), empty otherwise. */
  readonly trailing: ReadonlyArray<Token>
}

/** Index of the bracket that closes the opener at `from`, or -1. */
export const findClosing = (tokens: ReadonlyArray<Token>, from: number): number => {
  let depth = 0
  for (let k = from; k < tokens.length; k++) {
    const t = tokens[k]
    if (isPunct(t, '(', '[', '{')) depth++
    else if (isPunct(t, ')', ']', '}')) {
      depth--
      if (depth === 0) return k
    }
  }
  return -1
}

/** Splits a token run on commas at bracket depth zero. */
export const splitTopLevel = (tokens: ReadonlyArray<Token>, separator = ','): ReadonlyArray<ReadonlyArray<Token>> => {
  const out: Token[][] = []
  let current: Token[] = []
  let depth = 0
  for (const t of tokens) {
    if (isPunct(t, '(', '[', '{')) depth++
    if (isPunct(t, ')', ']', '}')) depth--
    if (depth === 0 && isPunct(t, separator)) {
      out.push(current)
      current = []
      continue
    }
    current.push(t)
  }
  if (current.length > 0 || out.length > 0) out.push(current)
  return out
}

const keyOf = (piece: ReadonlyArray<Token>): { readonly key: string; readonly keyToken: Token; readonly rest: number } | undefined => {
  const first = piece[0]
  const second = piece[1]
  if (first === undefined) return undefined
  if (first.kind === 'label') return { key: first.value, keyToken: first, rest: 1 }
  if (first.kind === 'symbol' && isPunct(second, '=>')) return { key: first.value, keyToken: first, rest: 2 }
  if (first.kind === 'string' && first.flavor !== 'heredoc' && second !== undefined) {
    const text = plainStringValue(first)
    if (text === undefined) return undefined
    if (isPunct(second, '=>')) return { key: text, keyToken: first, rest: 2 }
    if (isPunct(second, ':') && !second.spaceBefore) return { key: text, keyToken: first, rest: 2 }
  }
  return undefined
}

export const toArguments = (pieces: ReadonlyArray<ReadonlyArray<Token>>): ReadonlyArray<Argument> =>
  pieces
    .filter((piece) => piece.length > 0)
    .map((piece): Argument => {
      const key = keyOf(piece)
      return key !== undefined
        ? { kind: 'keyword', key: key.key, keyToken: key.keyToken, tokens: piece.slice(key.rest) }
        : { kind: 'positional', tokens: piece }
    })

/**
 * Reads `name arg, key: v` and `name(arg, key: v)` call shapes. A parenthesized first argument that is followed by more
 * tokens (`name (a + b) * 2`) is treated as a plain expression, not as the call's parentheses.
 */
export const readCall = (tokens: ReadonlyArray<Token>): CallShape | undefined => {
  const name = tokens[0]
  if (name === undefined) return undefined
  const open = tokens[1]
  if (isPunct(open, '(') && open !== undefined && !open.spaceBefore) {
    const close = findClosing(tokens, 1)
    if (close === -1) return { name, args: toArguments(splitTopLevel(tokens.slice(2))), trailing: [] }
    return { name, args: toArguments(splitTopLevel(tokens.slice(2, close))), trailing: tokens.slice(close + 1) }
  }
  return { name, args: toArguments(splitTopLevel(tokens.slice(1))), trailing: [] }
}
