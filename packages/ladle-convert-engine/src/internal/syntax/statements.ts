import { lex, type LexProblem } from '../lexer/lexer.js'
import { isKeyword, isPunct, type Token } from '../lexer/tokens.js'
import { ReasonCodes, type ReasonCode } from '../reasonCodes.js'
import { indentOfLine, makeLineIndex, type LineIndex } from '../span.js'

export type Block = {
  readonly kind: 'do' | 'brace'
  readonly open: Token
  /** Absent when the block was never closed. */
  readonly close?: Token
  readonly params: ReadonlyArray<string>
  readonly body: ReadonlyArray<Statement>
}

type StatementBase = {
  readonly start: number
  readonly end: number
  /** Index of the first token of the statement in the file's token list. */
  readonly firstIndex: number
}

export type CommandStatement = StatementBase & {
  readonly kind: 'command'
  readonly tokens: ReadonlyArray<Token>
  readonly block?: Block
  /** Blocks nested inside the head (e.g. inside parentheses); kept for span bookkeeping only. */
  readonly innerBlocks: ReadonlyArray<Block>
  /** Trailing `if`/`unless`/`while`/`until` modifier (`package 'curl' if platform?('ubuntu')`). */
  readonly modifier?: Modifier
}

export type Modifier = {
  readonly keyword: 'if' | 'unless' | 'while' | 'until'
  readonly condition: ReadonlyArray<Token>
  readonly start: number
}

export type Branch = {
  readonly keyword: 'if' | 'elsif' | 'unless' | 'when' | 'else'
  readonly condition: ReadonlyArray<Token>
  readonly body: ReadonlyArray<Statement>
  readonly start: number
}

export type ConditionalStatement = StatementBase & {
  readonly kind: 'conditional'
  readonly keyword: 'if' | 'unless' | 'case'
  readonly subject: ReadonlyArray<Token>
  readonly branches: ReadonlyArray<Branch>
  readonly open: Token
  readonly close?: Token
}

export type CompoundStatement = StatementBase & {
  readonly kind: 'compound'
  readonly keyword: string
  readonly head: ReadonlyArray<Token>
  readonly body: ReadonlyArray<Statement>
  readonly open: Token
  readonly close?: Token
}

export type Statement = CommandStatement | ConditionalStatement | CompoundStatement

export type ParseProblem = LexProblem

export type ParsedProgram = {
  readonly text: string
  readonly lines: LineIndex
  readonly tokens: ReadonlyArray<Token>
  readonly statements: ReadonlyArray<Statement>
  readonly problems: ReadonlyArray<ParseProblem>
}

const CONTINUATION_PUNCT: ReadonlySet<string> = new Set([
  ',',
  '&&',
  '||',
  '+',
  '-',
  '*',
  '/',
  '=',
  '==',
  '!=',
  '=>',
  '.',
  '&.',
  '?',
  ':',
  '<<',
  '+=',
  '-=',
  '||=',
  '&&=',
  '=~',
  '\\',
])

const COMPOUND_KEYWORDS: ReadonlySet<string> = new Set(['begin', 'def', 'class', 'module', 'while', 'until', 'for'])
const LOOP_KEYWORDS: ReadonlySet<string> = new Set(['while', 'until', 'for'])

/** `if`/`unless`/`case` opening a value after these tokens starts a compound expression, not a modifier. */
const VALUE_OPENERS: ReadonlySet<string> = new Set(['=', '(', ',', '||=', '&&=', '+=', '=>', '[', '||', '&&'])

const modifierKeyword = (word: string): Modifier['keyword'] =>
  word === 'unless' ? 'unless' : word === 'while' ? 'while' : word === 'until' ? 'until' : 'if'

const endsWithContinuation = (head: ReadonlyArray<Token>): boolean => {
  const last = head[head.length - 1]
  if (last === undefined) return false
  if (last.kind === 'punct') return CONTINUATION_PUNCT.has(last.value)
  return isKeyword(last, 'and', 'or', 'not')
}

/**
 * Builds the statement tree of a DSL file. Never throws: unbalanced openers are recorded as problems and parsing
 * resumes at the next line indented at or left of the opener.
 */
export const parseProgram = (text: string): ParsedProgram => {
  const lines = makeLineIndex(text)
  const lexed = lex(text)
  const tokens = lexed.tokens
  const problems: ParseProblem[] = [...lexed.problems]
  const n = tokens.length
  let i = 0

  const problem = (code: ReasonCode, opener: Token, message: string): void => {
    problems.push({ code, offset: opener.start, message })
  }

  const isFirstOnLine = (index: number): boolean => {
    const prev = tokens[index - 1]
    return prev === undefined || prev.kind === 'newline'
  }

  /** First statement of `body` that sits at or left of the opener's indentation. */
  const findResyncStatement = (body: ReadonlyArray<Statement>, opener: Token): number => {
    const openerIndent = indentOfLine(lines, opener.start)
    for (let k = 0; k < body.length; k++) {
      const stmt = body[k]
      if (stmt === undefined) continue
      const first = tokens[stmt.firstIndex]
      if (first === undefined || first.start <= opener.start) continue
      if (isFirstOnLine(stmt.firstIndex) && indentOfLine(lines, first.start) <= openerIndent) return k
    }
    return -1
  }

  /** Token index of the first line start at or left of the opener's indentation, scanning from `from`. */
  const findResyncToken = (from: number, opener: Token): number => {
    const openerIndent = indentOfLine(lines, opener.start)
    for (let k = from; k < n; k++) {
      const t = tokens[k]
      if (t === undefined || t.kind === 'newline' || !isFirstOnLine(k)) continue
      if (t.start <= opener.start) continue
      if (indentOfLine(lines, t.start) > openerIndent) continue
      if (isKeyword(t, 'end') || isPunct(t, ')', ']', '}')) continue
      return k
    }
    return n
  }

  const skipSeparators = (): void => {
    while (i < n) {
      const t = tokens[i]
      if (t === undefined) break
      if (t.kind === 'newline' || isPunct(t, ';')) i++
      else break
    }
  }

  const lastEnd = (fallback: number): number => {
    for (let k = i - 1; k >= 0; k--) {
      const prev = tokens[k]
      if (prev !== undefined && prev.kind !== 'newline') return prev.end
    }
    return fallback
  }

  const parseStatements = (stop: (t: Token) => boolean): Statement[] => {
    const out: Statement[] = []
    while (i < n) {
      skipSeparators()
      const t = tokens[i]
      if (t === undefined) break
      if (stop(t)) return out
      if (isKeyword(t, 'end', 'elsif', 'when') || isPunct(t, ')', ']', '}')) {
        problem(ReasonCodes.blockUnexpectedEnd, t, `unexpected '${t.text}' with no open block`)
        i++
        continue
      }
      if (isKeyword(t, 'else', 'rescue', 'ensure', 'then')) {
        i++
        continue
      }
      out.push(parseStatement(t))
    }
    return out
  }

  /** Tokens up to the end of the line (or `then`/`do`), respecting bracket depth. */
  const readLine = (stopAtDo: boolean): Token[] => {
    const out: Token[] = []
    let depth = 0
    while (i < n) {
      const t = tokens[i]
      if (t === undefined) break
      if (depth === 0) {
        if (t.kind === 'newline' || isPunct(t, ';')) {
          if (endsWithContinuation(out)) {
            i++
            continue
          }
          break
        }
        if (isKeyword(t, 'then')) {
          i++
          break
        }
        if (stopAtDo && isKeyword(t, 'do')) {
          i++
          break
        }
      }
      if (isPunct(t, '(', '[', '{')) depth++
      if (isPunct(t, ')', ']', '}')) depth = Math.max(0, depth - 1)
      if (t.kind !== 'newline') out.push(t)
      i++
    }
    return out
  }

  const readBlockParams = (): string[] => {
    const params: string[] = []
    if (!isPunct(tokens[i], '|', '||')) return params
    if (isPunct(tokens[i], '||')) {
      i++
      return params
    }
    i++
    while (i < n && !isPunct(tokens[i], '|')) {
      const t = tokens[i]
      if (t !== undefined && t.kind === 'ident') params.push(t.value)
      i++
    }
    i++
    return params
  }

  const parseBlock = (open: Token, kind: 'do' | 'brace'): Block => {
    i++
    const params = readBlockParams()
    const body = parseStatements((t) => (kind === 'do' ? isKeyword(t, 'end') : isPunct(t, '}')))
    const close = tokens[i]
    if (close !== undefined && (kind === 'do' ? isKeyword(close, 'end') : isPunct(close, '}'))) {
      i++
      return { kind, open, close, params, body }
    }

    problem(
      ReasonCodes.blockUnterminated,
      open,
      kind === 'do' ? "block opened with 'do' is never closed with 'end'" : "block opened with '{' is never closed",
    )
    const resync = findResyncStatement(body, open)
    if (resync !== -1) {
      const stmt = body[resync]
      if (stmt !== undefined) i = stmt.firstIndex
      return { kind, open, params, body: body.slice(0, resync) }
    }
    return { kind, open, params, body }
  }

  const parseConditional = (open: Token): ConditionalStatement => {
    const firstIndex = i
    const keyword = open.text === 'unless' ? 'unless' : open.text === 'case' ? 'case' : 'if'
    i++
    const branches: Branch[] = []
    let subject: Token[] = []
    let close: Token | undefined

    const stopIf = (t: Token): boolean => isKeyword(t, 'elsif', 'else', 'end')
    const stopCase = (t: Token): boolean => isKeyword(t, 'when', 'else', 'end')

    if (keyword === 'case') {
      subject = readLine(false)
      skipSeparators()
    } else {
      const condition = readLine(false)
      branches.push({ keyword, condition, body: parseStatements(stopIf), start: open.start })
    }

    while (i < n) {
      skipSeparators()
      const t = tokens[i]
      if (t === undefined) break
      if (isKeyword(t, 'elsif') && keyword !== 'case') {
        i++
        const condition = readLine(false)
        branches.push({ keyword: 'elsif', condition, body: parseStatements(stopIf), start: t.start })
        continue
      }
      if (isKeyword(t, 'when') && keyword === 'case') {
        i++
        const condition = readLine(false)
        branches.push({ keyword: 'when', condition, body: parseStatements(stopCase), start: t.start })
        continue
      }
      if (isKeyword(t, 'else')) {
        i++
        branches.push({ keyword: 'else', condition: [], body: parseStatements((x) => isKeyword(x, 'end')), start: t.start })
        continue
      }
      if (isKeyword(t, 'end')) {
        close = t
        i++
      }
      break
    }

    if (close === undefined) {
      problem(ReasonCodes.blockUnterminated, open, `'${open.text}' is never closed with 'end'`)
      const lastBranch = branches[branches.length - 1]
      if (lastBranch !== undefined) {
        const resync = findResyncStatement(lastBranch.body, open)
        if (resync !== -1) {
          const stmt = lastBranch.body[resync]
          if (stmt !== undefined) i = stmt.firstIndex
          branches[branches.length - 1] = { ...lastBranch, body: lastBranch.body.slice(0, resync) }
        }
      }
    }

    return {
      kind: 'conditional',
      keyword,
      subject,
      branches,
      open,
      ...(close !== undefined ? { close } : null),
      start: open.start,
      end: lastEnd(open.end),
      firstIndex,
    }
  }

  const parseCompound = (open: Token): CompoundStatement => {
    const firstIndex = i
    i++
    const head = readLine(LOOP_KEYWORDS.has(open.text))
    const body = parseStatements((t) => isKeyword(t, 'end'))
    let close: Token | undefined
    let trimmedBody = body
    if (isKeyword(tokens[i], 'end')) {
      close = tokens[i]
      i++
    } else {
      problem(ReasonCodes.blockUnterminated, open, `'${open.text}' is never closed with 'end'`)
      const resync = findResyncStatement(body, open)
      if (resync !== -1) {
        const stmt = body[resync]
        if (stmt !== undefined) i = stmt.firstIndex
        trimmedBody = body.slice(0, resync)
      }
    }
    return {
      kind: 'compound',
      keyword: open.text,
      head,
      body: trimmedBody,
      open,
      ...(close !== undefined ? { close } : null),
      start: open.start,
      end: lastEnd(open.end),
      firstIndex,
    }
  }

  const braceOpensBlock = (head: ReadonlyArray<Token>): boolean => {
    const last = head[head.length - 1]
    if (last === undefined) return false
    if (last.kind === 'ident' || last.kind === 'const' || last.kind === 'string' || last.kind === 'symbol') return true
    return isPunct(last, ')', ']')
  }

  const parseCommand = (first: Token): CommandStatement => {
    const firstIndex = i
    const head: Token[] = []
    const innerBlocks: Block[] = []
    const openers: Token[] = []
    let block: Block | undefined
    let modifier: Modifier | undefined

    while (i < n) {
      const t = tokens[i]
      if (t === undefined) break
      const depth = openers.length

      if (t.kind === 'newline' || isPunct(t, ';')) {
        if (depth > 0 || endsWithContinuation(head)) {
          i++
          continue
        }
        const next = tokens[i + 1]
        if (t.kind === 'newline' && next !== undefined && isPunct(next, '.', '&.')) {
          i++
          continue
        }
        break
      }

      if (depth === 0) {
        if (isKeyword(t, 'end', 'elsif', 'else', 'when', 'rescue', 'ensure')) break
        if (isPunct(t, ')', ']', '}')) break
        if (isKeyword(t, 'do') || (isPunct(t, '{') && braceOpensBlock(head))) {
          const parsed = parseBlock(t, isKeyword(t, 'do') ? 'do' : 'brace')
          if (block === undefined) block = parsed
          else innerBlocks.push(parsed)
          // resynchronized after an unclosed block: the next statement starts here
          if (parsed.close === undefined) break
          continue
        }
      } else if (isKeyword(t, 'do')) {
        const parsed = parseBlock(t, 'do')
        innerBlocks.push(parsed)
        if (parsed.close === undefined) break
        continue
      }

      if (isKeyword(t, 'if', 'unless', 'case', 'begin', 'while', 'until')) {
        const prev = head[head.length - 1]
        const opensValue = t.value === 'case' || t.value === 'begin' || (prev !== undefined && prev.kind === 'punct' && VALUE_OPENERS.has(prev.value))
        if (opensValue) {
          const nested = t.value === 'if' || t.value === 'unless' || t.value === 'case' ? parseConditional(t) : parseCompound(t)
          head.push(...tokens.slice(nested.firstIndex, i).filter((x) => x.kind !== 'newline'))
          continue
        }
        if (depth === 0 && prev !== undefined) {
          i++
          modifier = { keyword: modifierKeyword(t.value), condition: readLine(false), start: t.start }
          break
        }
      }

      if (isPunct(t, '(', '[', '{')) openers.push(t)
      if (isPunct(t, ')', ']', '}')) openers.pop()
      head.push(t)
      i++
    }

    const unclosed = openers[openers.length - 1]
    if (unclosed !== undefined) {
      problem(ReasonCodes.delimiterUnbalanced, unclosed, `'${unclosed.text}' is never closed`)
      const resync = findResyncToken(firstIndex + 1, unclosed)
      const cut = head.findIndex((t) => {
        const at = tokens.indexOf(t)
        return at >= resync
      })
      if (cut !== -1) head.length = cut
      i = Math.max(resync, firstIndex + 1)
    }

    const lastToken = head[head.length - 1]
    const modifierEnd = modifier?.condition[modifier.condition.length - 1]?.end ?? 0
    const end = Math.max(block?.close?.end ?? block?.open.end ?? 0, lastToken?.end ?? first.end, modifierEnd)
    return {
      kind: 'command',
      tokens: head,
      ...(block !== undefined ? { block } : null),
      ...(modifier !== undefined ? { modifier } : null),
      innerBlocks,
      start: first.start,
      end,
      firstIndex,
    }
  }

  const parseStatement = (t: Token): Statement => {
    if (isKeyword(t, 'if', 'unless', 'case')) return parseConditional(t)
    if (t.kind === 'keyword' && COMPOUND_KEYWORDS.has(t.value)) return parseCompound(t)
    return parseCommand(t)
  }

  const statements = parseStatements(() => false)
  return { text, lines, tokens, statements, problems }
}

/** Source text covered by a run of tokens (including anything between them). */
export const sourceOf = (text: string, tokens: ReadonlyArray<Token>): string => {
  const first = tokens[0]
  const last = tokens[tokens.length - 1]
  if (first === undefined || last === undefined) return ''
  return text.slice(first.start, last.end)
}
