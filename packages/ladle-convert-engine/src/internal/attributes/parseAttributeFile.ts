import { makeDiagnostic, type Diagnostic } from '../diagnostics.js'
import { isPunct, type Token } from '../lexer/tokens.js'
import { ReasonCodes } from '../reasonCodes.js'
import { spanAtOffset, spanOfRange } from '../span.js'
import { parseProgram, sourceOf, type CommandStatement, type Statement } from '../syntax/statements.js'
import type { ValueExpr } from '../value/model.js'
import { normalizeTokens, readKeys } from '../value/normalize.js'
import { isPrecedence, keyPathId, type AttributeAssignment, type Precedence } from './model.js'

const assignedId = (precedence: Precedence, keyPath: ReadonlyArray<string>): string =>
  `${precedence}\u0001${keyPathId(keyPath)}`

/** Leaf paths a value sets: hash values set each of their keys. */
const leafPaths = (keyPath: ReadonlyArray<string>, value: ValueExpr): ReadonlyArray<ReadonlyArray<string>> =>
  value.kind === 'Map' && value.entries.length > 0
    ? value.entries.flatMap((e) => leafPaths([...keyPath, e.key], e.value))
    : [keyPath]

/** The path, one of its ancestors or one of its descendants already holds a value at that level. */
const isAssigned = (assigned: AssignedPaths, precedence: Precedence, keyPath: ReadonlyArray<string>): boolean => {
  for (let k = 1; k <= keyPath.length; k++) {
    if (assigned.has(assignedId(precedence, keyPath.slice(0, k)))) return true
  }
  const prefix = `${assignedId(precedence, keyPath)}\u0000`
  for (const id of assigned) {
    if (id.startsWith(prefix)) return true
  }
  return false
}

export type ParseAttributeFileArgs = {
  readonly source: string
  readonly text: string
  /** Index given to the first assignment, for ordering across several files. */
  readonly startIndex?: number
  /**
   * Paths already given a value, shared across the files of a cookbook so that `*_unless` sees earlier files.
   * Filled in as assignments are read.
   */
  readonly assigned?: AssignedPaths
}

/** Leaf paths set so far, as `<precedence>\u0001<keyPathId>`. */
export type AssignedPaths = Set<string>

export type AttributeFileResult = {
  readonly assignments: ReadonlyArray<AttributeAssignment>
  readonly diagnostics: ReadonlyArray<Diagnostic>
}

type Target = {
  readonly precedence: Precedence
  /** `*_unless` and `||=`: only applies when the path has no value yet at that level. */
  readonly unless: boolean
  readonly keyPath: ReadonlyArray<string>
}

const ASSIGNMENT_OPS: ReadonlySet<string> = new Set(['=', '||='])

const levelOf = (word: string): { readonly precedence: Precedence; readonly unless: boolean } | undefined => {
  const unless = word.endsWith('_unless')
  const base = unless ? word.slice(0, -'_unless'.length) : word
  if (base === 'set') return { precedence: 'normal', unless }
  return isPrecedence(base) ? { precedence: base, unless } : undefined
}

export const parseAttributeFile = (args: ParseAttributeFileArgs): AttributeFileResult => {
  const { source, text } = args
  const program = parseProgram(text)
  const { lines } = program
  const constants = new Map<string, ValueExpr>()
  const assignments: AttributeAssignment[] = []
  const assigned: AssignedPaths = args.assigned ?? new Set()
  const diagnostics: Diagnostic[] = program.problems.map((p) =>
    makeDiagnostic({ kind: 'StructuralParseError', code: p.code, message: p.message, source, span: spanAtOffset(lines, p.offset) }),
  )
  let index = args.startIndex ?? 0

  const readTarget = (left: ReadonlyArray<Token>, op: string): Target | undefined => {
    const [root, dot, levelToken] = left
    if (root === undefined || root.kind !== 'ident') return undefined
    let level = levelOf(root.value)
    let from = 1
    if (root.value === 'node') {
      if (isPunct(dot, '.') && levelToken !== undefined && levelToken.kind === 'ident') {
        level = levelOf(levelToken.value)
        from = 3
      } else {
        // bare node[...] writes land at normal level
        level = { precedence: 'normal', unless: false }
      }
    }
    if (level === undefined) return undefined
    const read = readKeys({ tokens: left, from, allowDotted: false, constants })
    if (read === undefined || read.keys.length === 0 || read.next !== left.length) return undefined
    return { precedence: level.precedence, unless: level.unless || op === '||=', keyPath: read.keys }
  }

  const unsupported = (stmt: Statement, what: string): void => {
    diagnostics.push(
      makeDiagnostic({
        kind: 'UnrecognizedConstruct',
        code: ReasonCodes.attributeUnsupportedStatement,
        message: `${what} is not an attribute assignment and was skipped`,
        source,
        span: spanOfRange(lines, stmt.start, stmt.end),
      }),
    )
  }

  const walkCommand = (stmt: CommandStatement, underCondition: boolean): void => {
    if (stmt.modifier !== undefined && !underCondition) {
      diagnostics.push(
        makeDiagnostic({
          kind: 'UnrecognizedConstruct',
          code: ReasonCodes.attributeConditional,
          message: `assignment under a trailing '${stmt.modifier.keyword}' depends on converge-time data; it is kept`,
          source,
          span: spanOfRange(lines, stmt.start, stmt.end),
        }),
      )
    }
    const conditional = underCondition || stmt.modifier !== undefined
    const opIndex = stmt.tokens.findIndex((t) => t.kind === 'punct' && ASSIGNMENT_OPS.has(t.value))
    const op = stmt.tokens[opIndex]
    if (opIndex <= 0 || op === undefined || stmt.block !== undefined) {
      unsupported(stmt, `'${sourceOf(text, stmt.tokens)}'`)
      return
    }
    const left = stmt.tokens.slice(0, opIndex)
    const right = stmt.tokens.slice(opIndex + 1)
    const first = left[0]

    if (left.length === 1 && first !== undefined && (first.kind === 'const' || first.kind === 'ident') && op.text === '=') {
      if (stmt.modifier !== undefined) {
        constants.delete(first.value)
        return
      }
      const local = normalizeTokens({ source, text, lines, constants }, right)
      if (local.value.kind === 'Opaque') constants.delete(first.value)
      else constants.set(first.value, local.value)
      return
    }

    const target = readTarget(left, op.text)
    if (target === undefined) {
      unsupported(stmt, `assignment to '${sourceOf(text, left)}'`)
      return
    }

    if (target.unless && isAssigned(assigned, target.precedence, target.keyPath)) return

    const normalized = normalizeTokens({ source, text, lines, constants }, right)
    diagnostics.push(...normalized.diagnostics)
    for (const path of leafPaths(target.keyPath, normalized.value)) assigned.add(assignedId(target.precedence, path))
    assignments.push({
      precedence: target.precedence,
      keyPath: target.keyPath,
      value: normalized.value,
      index: index++,
      source,
      span: spanOfRange(lines, stmt.start, stmt.end),
      ...(conditional ? { conditional: true } : null),
    })
  }

  const walk = (statements: ReadonlyArray<Statement>, conditional: boolean): void => {
    for (const stmt of statements) {
      if (stmt.kind === 'command') {
        walkCommand(stmt, conditional)
        continue
      }
      if (stmt.kind === 'conditional') {
        if (!conditional) {
          diagnostics.push(
            makeDiagnostic({
              kind: 'UnrecognizedConstruct',
              code: ReasonCodes.attributeConditional,
              message: `assignments under '${stmt.keyword}' depend on converge-time data; every branch is kept`,
              source,
              span: spanOfRange(lines, stmt.start, stmt.end),
            }),
          )
        }
        for (const branch of stmt.branches) walk(branch.body, true)
        continue
      }
      if (stmt.keyword === 'begin') walk(stmt.body, conditional)
      else unsupported(stmt, `'${stmt.keyword}' block`)
    }
  }

  walk(program.statements, false)
  return { assignments, diagnostics }
}
