import { ReasonCodes, type ReasonCode } from '../reasonCodes.js'
import { KEYWORDS, type NamedToken, type StringPart, type StringToken, type Token } from './tokens.js'

export type LexProblem = {
  readonly code: ReasonCode
  /** Offset of the opener that could not be closed. */
  readonly offset: number
  readonly message: string
}

export type LexResult = {
  readonly tokens: ReadonlyArray<Token>
  readonly problems: ReadonlyArray<LexProblem>
}

const PUNCTUATORS = [
  '**=',
  '<=>',
  '===',
  '...',
  '<<=',
  '>>=',
  '&&=',
  '||=',
  '==',
  '!=',
  '>=',
  '<=',
  '&&',
  '||',
  '<<',
  '>>',
  '=~',
  '!~',
  '=>',
  '->',
  '::',
  '..',
  '+=',
  '-=',
  '*=',
  '/=',
  '%=',
  '|=',
  '&=',
  '**',
  '&.',
] as const

const PAIRS: Readonly<Record<string, string>> = { '(': ')', '[': ']', '{': '}', '<': '>' }

const isIdentStart = (ch: string | undefined): boolean => ch !== undefined && /[A-Za-z_\u0080-\uffff]/.test(ch)
const isIdentChar = (ch: string | undefined): boolean => ch !== undefined && /[A-Za-z0-9_\u0080-\uffff]/.test(ch)
const isDigit = (ch: string | undefined): boolean => ch !== undefined && ch >= '0' && ch <= '9'

const NUMBER_RE = /^(?:0[xX][0-9a-fA-F_]+|0[bB][01_]+|\d[\d_]*(?:\.\d[\d_]*)?(?:[eE][+-]?\d+)?)/
const HEREDOC_RE = /^<<([~-]?)(["'`]?)([A-Za-z_][A-Za-z0-9_]*)\2/

const cookEscape = (ch: string): string => {
  switch (ch) {
    case 'n':
      return '\n'
    case 't':
      return '\t'
    case 's':
      return ' '
    case 'r':
      return '\r'
    case '0':
      return '\0'
    case 'e':
      return '\u001b'
    case '\n':
      return ''
    default:
      return ch
  }
}

/** Index of the `}` closing an interpolation that starts at `from`, or -1. */
const findInterpolationEnd = (text: string, from: number): number => {
  let depth = 0
  let j = from
  while (j < text.length) {
    const c = text[j]
    if (c === '\\') {
      j += 2
      continue
    }
    if (c === '"' || c === "'") {
      let k = j + 1
      while (k < text.length && text[k] !== c) {
        if (text[k] === '\\') k++
        k++
      }
      j = k + 1
      continue
    }
    if (c === '{') depth++
    if (c === '}') {
      if (depth === 0) return j
      depth--
    }
    j++
  }
  return -1
}

type QuotedRead = { readonly parts: ReadonlyArray<StringPart>; readonly end: number; readonly terminated: boolean }

/**
 * Reads quoted content starting right after the opening delimiter.
 * `close === undefined` reads to the end of `text` (heredoc bodies).
 */
const readQuoted = (args: {
  readonly text: string
  readonly from: number
  readonly base: number
  readonly open?: string
  readonly close?: string
  readonly interpolate: boolean
}): QuotedRead => {
  const { text, open, close, interpolate } = args
  const parts: StringPart[] = []
  let buf = ''
  let depth = 0
  let i = args.from

  const flush = (): void => {
    if (buf.length > 0) parts.push({ kind: 'text', value: buf })
    buf = ''
  }

  while (i < text.length) {
    const c = text[i] ?? ''
    if (c === '\\') {
      const next = text[i + 1] ?? ''
      if (interpolate) buf += cookEscape(next)
      else if (next === '\\' || next === close || next === open) buf += next
      else buf += c + next
      i += 2
      continue
    }
    if (interpolate && c === '#' && text[i + 1] === '{') {
      const codeEnd = findInterpolationEnd(text, i + 2)
      if (codeEnd !== -1) {
        flush()
        parts.push({ kind: 'code', source: text.slice(i + 2, codeEnd), offset: args.base + i + 2 })
        i = codeEnd + 1
        continue
      }
    }
    if (close !== undefined) {
      if (open !== undefined && open !== close && c === open) depth++
      else if (c === close) {
        if (depth === 0) {
          flush()
          return { parts, end: i + 1, terminated: true }
        }
        depth--
      }
    }
    buf += c
    i++
  }

  flush()
  return { parts, end: text.length, terminated: close === undefined }
}

const dedentParts = (parts: ReadonlyArray<StringPart>): ReadonlyArray<StringPart> => {
  const plain = parts.map((p) => (p.kind === 'text' ? p.value : 'x')).join('')
  const indents = plain
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map((line) => line.length - line.trimStart().length)
  const strip = indents.length > 0 ? Math.min(...indents) : 0
  if (strip === 0) return parts

  let atLineStart = true
  return parts.map((p) => {
    if (p.kind === 'code') {
      atLineStart = false
      return p
    }
    let out = ''
    let removed = 0
    for (const ch of p.value) {
      if (ch === '\n') {
        out += ch
        atLineStart = true
        removed = 0
        continue
      }
      if (atLineStart && (ch === ' ' || ch === '\t') && removed < strip) {
        removed++
        continue
      }
      atLineStart = false
      out += ch
    }
    return { kind: 'text', value: out }
  })
}

type PendingHeredoc = {
  readonly tokenIndex: number
  readonly id: string
  readonly squiggly: boolean
  readonly indented: boolean
  readonly interpolate: boolean
  readonly start: number
  readonly end: number
  readonly text: string
  readonly spaceBefore: boolean
}

/**
 * Tokenizes recipe DSL text. Strings, heredocs, comments and percent literals are consumed whole so that
 * `do`/`end`/braces inside them never reach the structural parser.
 *
 * `base` shifts every offset (used when re-lexing the code inside `#{...}`).
 */
export const lex = (text: string, base = 0): LexResult => {
  const tokens: Token[] = []
  const problems: LexProblem[] = []
  const pending: PendingHeredoc[] = []
  const n = text.length

  let i = 0
  let spaceBefore = false
  let atLineStart = true

  const last = (): Token | undefined => tokens[tokens.length - 1]

  const pushNamed = (kind: NamedToken['kind'], start: number, end: number, value: string): void => {
    tokens.push({ kind, start: base + start, end: base + end, text: text.slice(start, end), value, spaceBefore })
    spaceBefore = false
  }

  const pushString = (flavor: StringToken['flavor'], start: number, end: number, parts: ReadonlyArray<StringPart>): void => {
    tokens.push({ kind: 'string', flavor, start: base + start, end: base + end, text: text.slice(start, end), parts, spaceBefore })
    spaceBefore = false
  }

  const afterDot = (): boolean => {
    const prev = last()
    return prev !== undefined && prev.kind === 'punct' && (prev.value === '.' || prev.value === '&.')
  }

  const inValuePosition = (nextChar: string | undefined): boolean => {
    const prev = last()
    if (prev === undefined || prev.kind === 'newline') return true
    if (prev.kind === 'punct') return prev.value !== ')' && prev.value !== ']' && prev.value !== '}'
    if (prev.kind === 'keyword') return !['end', 'self', 'true', 'false', 'nil'].includes(prev.value)
    if (prev.kind === 'label') return true
    if (prev.kind === 'ident') return spaceBefore && nextChar !== ' ' && nextChar !== '='
    return false
  }

  const endOfLine = (from: number): number => {
    const eol = text.indexOf('\n', from)
    return eol === -1 ? n : eol
  }

  const consumeHeredocBodies = (from: number): number => {
    let pos = from
    for (const h of pending) {
      const bodyStart = pos
      let bodyEnd = n
      let found = false
      while (pos < n) {
        const lineEnd = endOfLine(pos)
        const line = text.slice(pos, lineEnd).replace(/\r$/, '')
        const matches = h.indented || h.squiggly ? line.trim() === h.id : line === h.id
        const next = lineEnd === n ? n : lineEnd + 1
        if (matches) {
          bodyEnd = pos
          pos = next
          found = true
          break
        }
        pos = next
      }
      if (!found) {
        problems.push({
          code: ReasonCodes.heredocUnterminated,
          offset: base + h.start,
          message: `heredoc <<${h.id} is never terminated`,
        })
      }
      const body = text.slice(bodyStart, bodyEnd)
      const read = readQuoted({ text: body, from: 0, base: base + bodyStart, interpolate: h.interpolate })
      const parts = h.squiggly ? dedentParts(read.parts) : read.parts
      tokens[h.tokenIndex] = {
        kind: 'string',
        flavor: 'heredoc',
        start: base + h.start,
        end: base + h.end,
        text: h.text,
        parts,
        spaceBefore: h.spaceBefore,
      }
    }
    pending.length = 0
    return pos
  }

  const readPercentLiteral = (start: number): boolean => {
    const kindChar = /[A-Za-z]/.test(text[start + 1] ?? '') ? (text[start + 1] ?? '') : ''
    if (kindChar !== '' && !'wWiIqQr'.includes(kindChar)) return false
    const delimAt = start + 1 + kindChar.length
    const open = text[delimAt]
    if (open === undefined || /[A-Za-z0-9\s]/.test(open)) return false
    const close = PAIRS[open] ?? open

    if (kindChar === 'w' || kindChar === 'W' || kindChar === 'i' || kindChar === 'I') {
      const read = readQuoted({ text, from: delimAt + 1, base, open, close, interpolate: false })
      if (!read.terminated) return false
      const raw = read.parts.map((p) => (p.kind === 'text' ? p.value : '')).join('')
      tokens.push({
        kind: 'words',
        start: base + start,
        end: base + read.end,
        text: text.slice(start, read.end),
        words: raw.split(/\s+/).filter((w) => w.length > 0),
        symbols: kindChar === 'i' || kindChar === 'I',
        spaceBefore,
      })
      spaceBefore = false
      i = read.end
      return true
    }

    if (kindChar === 'r') {
      const read = readQuoted({ text, from: delimAt + 1, base, open, close, interpolate: false })
      if (!read.terminated) return false
      let end = read.end
      while (/[imxo]/.test(text[end] ?? '')) end++
      tokens.push({ kind: 'regex', start: base + start, end: base + end, text: text.slice(start, end), spaceBefore })
      spaceBefore = false
      i = end
      return true
    }

    const read = readQuoted({ text, from: delimAt + 1, base, open, close, interpolate: kindChar !== 'q' })
    if (!read.terminated) return false
    pushString('percent', start, read.end, read.parts)
    i = read.end
    return true
  }

  const readRegex = (start: number): boolean => {
    const eol = endOfLine(start)
    let j = start + 1
    let inClass = false
    while (j < eol) {
      const c = text[j]
      if (c === '\\') {
        j += 2
        continue
      }
      if (c === '[') inClass = true
      else if (c === ']') inClass = false
      else if (c === '/' && !inClass) break
      j++
    }
    if (j >= eol) return false
    j++
    while (/[imxo]/.test(text[j] ?? '')) j++
    tokens.push({ kind: 'regex', start: base + start, end: base + j, text: text.slice(start, j), spaceBefore })
    spaceBefore = false
    i = j
    return true
  }

  const readString = (start: number, quote: string): void => {
    const interpolate = quote !== "'"
    const read = readQuoted({ text, from: start + 1, base, open: quote, close: quote, interpolate })
    if (read.terminated) {
      pushString(quote === "'" ? 'single' : quote === '`' ? 'backtick' : 'double', start, read.end, read.parts)
      i = read.end
      return
    }
    problems.push({
      code: ReasonCodes.stringUnterminated,
      offset: base + start,
      message: `string opened with ${quote} is never closed`,
    })
    const eol = endOfLine(start)
    const partial = readQuoted({ text: text.slice(0, eol), from: start + 1, base, interpolate })
    pushString(quote === "'" ? 'single' : 'double', start, eol, partial.parts)
    i = eol
  }

  while (i < n) {
    const ch = text[i] ?? ''

    if (atLineStart) {
      if (text.startsWith('=begin', i) && /[\s]/.test(text[i + 6] ?? '\n')) {
        const close = text.indexOf('\n=end', i)
        i = close === -1 ? n : endOfLine(close + 1)
        continue
      }
      if (text.startsWith('__END__', i) && text.slice(i + 7, endOfLine(i)).trim() === '') break
    }

    if (ch === ' ' || ch === '\t' || ch === '\r') {
      i++
      spaceBefore = true
      atLineStart = false
      continue
    }
    if (ch === '\\' && (text[i + 1] === '\n' || (text[i + 1] === '\r' && text[i + 2] === '\n'))) {
      i = text.indexOf('\n', i) + 1
      spaceBefore = true
      continue
    }
    if (ch === '#') {
      i = endOfLine(i)
      continue
    }
    if (ch === '\n') {
      tokens.push({ kind: 'newline', start: base + i, end: base + i + 1, text: '\n', spaceBefore: false })
      i++
      if (pending.length > 0) i = consumeHeredocBodies(i)
      spaceBefore = false
      atLineStart = true
      continue
    }
    atLineStart = false

    if (ch === "'" || ch === '"' || ch === '`') {
      readString(i, ch)
      continue
    }

    if (ch === '<' && text[i + 1] === '<') {
      const m = HEREDOC_RE.exec(text.slice(i))
      const prev = last()
      const looksLikeShift = prev !== undefined && prev.kind !== 'newline' && !spaceBefore && prev.kind !== 'punct'
      if (m && !looksLikeShift) {
        const [whole, flag = '', quote = '', id = ''] = m
        if (flag !== '' || quote !== '' || /^[A-Z_][A-Z0-9_]*$/.test(id)) {
          pending.push({
            tokenIndex: tokens.length,
            id,
            squiggly: flag === '~',
            indented: flag === '-',
            interpolate: quote !== "'",
            start: i,
            end: i + whole.length,
            text: whole,
            spaceBefore,
          })
          // placeholder, replaced once the body has been read
          pushString('heredoc', i, i + whole.length, [])
          i += whole.length
          continue
        }
      }
    }

    if (ch === '%' && inValuePosition(text[i + 1]) && readPercentLiteral(i)) continue
    if (ch === '/' && inValuePosition(text[i + 1]) && readRegex(i)) continue

    if (isDigit(ch)) {
      const m = NUMBER_RE.exec(text.slice(i))
      const len = m ? m[0].length : 1
      pushNamed('number', i, i + len, text.slice(i, i + len))
      i += len
      continue
    }

    if (ch === '@' || ch === '$') {
      let j = i + 1
      if (text[j] === '@') j++
      while (isIdentChar(text[j])) j++
      pushNamed(ch === '@' ? 'ivar' : 'gvar', i, j, text.slice(i, j))
      i = j
      continue
    }

    if (ch === ':' && text[i + 1] !== ':') {
      const next = text[i + 1]
      if (next === '"' || next === "'") {
        const read = readQuoted({ text, from: i + 2, base, open: next, close: next, interpolate: next === '"' })
        if (read.terminated) {
          pushString('symbol', i, read.end, read.parts)
          i = read.end
          continue
        }
      } else if (isIdentStart(next)) {
        let j = i + 1
        while (isIdentChar(text[j])) j++
        if ((text[j] === '?' || text[j] === '!' || text[j] === '=') && text[j + 1] !== '=' && text[j + 1] !== '>') j++
        pushNamed('symbol', i, j, text.slice(i + 1, j))
        i = j
        continue
      }
    }

    if (isIdentStart(ch)) {
      let j = i
      while (isIdentChar(text[j])) j++
      if ((text[j] === '?' || text[j] === '!') && text[j + 1] !== '=') j++
      const word = text.slice(i, j)
      if (text[j] === ':' && text[j + 1] !== ':' && !word.endsWith('?')) {
        pushNamed('label', i, j + 1, word)
        i = j + 1
        continue
      }
      if (KEYWORDS.has(word) && !afterDot()) pushNamed('keyword', i, j, word)
      else pushNamed(/^[A-Z]/.test(word) ? 'const' : 'ident', i, j, word)
      i = j
      continue
    }

    const punct = PUNCTUATORS.find((p) => text.startsWith(p, i)) ?? ch
    pushNamed('punct', i, i + punct.length, punct)
    i += punct.length
  }

  if (pending.length > 0) consumeHeredocBodies(n)

  return { tokens, problems }
}
