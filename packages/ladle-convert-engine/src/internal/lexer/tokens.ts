export type StringPart =
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'code'; readonly source: string; readonly offset: number }

type TokenBase = {
  readonly start: number
  readonly end: number
  readonly text: string
  /** Whitespace (not a newline) separates this token from the previous one. */
  readonly spaceBefore: boolean
}

export type NamedToken = TokenBase & {
  readonly kind: 'ident' | 'const' | 'ivar' | 'gvar' | 'keyword' | 'punct' | 'label' | 'symbol' | 'number'
  readonly value: string
}

export type StringToken = TokenBase & {
  readonly kind: 'string'
  readonly flavor: 'single' | 'double' | 'heredoc' | 'percent' | 'backtick' | 'symbol'
  readonly parts: ReadonlyArray<StringPart>
}

export type WordsToken = TokenBase & {
  readonly kind: 'words'
  readonly words: ReadonlyArray<string>
  readonly symbols: boolean
}

export type OtherToken = TokenBase & { readonly kind: 'newline' | 'regex' }

export type Token = NamedToken | StringToken | WordsToken | OtherToken

export type TokenKind = Token['kind']

export const KEYWORDS: ReadonlySet<string> = new Set([
  'alias',
  'and',
  'begin',
  'break',
  'case',
  'class',
  'def',
  'defined?',
  'do',
  'else',
  'elsif',
  'end',
  'ensure',
  'false',
  'for',
  'if',
  'in',
  'module',
  'next',
  'nil',
  'not',
  'or',
  'redo',
  'rescue',
  'retry',
  'return',
  'self',
  'super',
  'then',
  'true',
  'undef',
  'unless',
  'until',
  'when',
  'while',
  'yield',
])

export const isKeyword = (token: Token | undefined, ...names: ReadonlyArray<string>): token is NamedToken & { readonly kind: 'keyword' } =>
  token !== undefined && token.kind === 'keyword' && (names.length === 0 || names.includes(token.value))

export const isPunct = (token: Token | undefined, ...values: ReadonlyArray<string>): boolean =>
  token !== undefined && token.kind === 'punct' && (values.length === 0 || values.includes(token.value))

export const isIdent = (token: Token | undefined, ...names: ReadonlyArray<string>): token is NamedToken =>
  token !== undefined && token.kind === 'ident' && (names.length === 0 || names.includes(token.value))

export const isNewline = (token: Token | undefined): boolean => token !== undefined && token.kind === 'newline'

/** Cooked text of a string token without interpolation, `undefined` when it interpolates. */
export const plainStringValue = (token: StringToken): string | undefined => {
  let out = ''
  for (const part of token.parts) {
    if (part.kind === 'code') return undefined
    out += part.value
  }
  return out
}
