import { makeDiagnostic, withResourceRef, type Diagnostic } from '../diagnostics.js'
import { isIdent, isPunct, type Token } from '../lexer/tokens.js'
import { formatResourceRef } from '../notify/targetRef.js'
import { ReasonCodes, type ReasonCode } from '../reasonCodes.js'
import { spanAtOffset, spanOfRange, type Span } from '../span.js'
import { readCall, type Argument } from '../syntax/arguments.js'
import {
  parseProgram,
  sourceOf,
  type Block,
  type CommandStatement,
  type ConditionalStatement,
  type ParsedProgram,
  type Statement,
} from '../syntax/statements.js'
import { interpolation, list, literal, literalString, map, opaque, type ValueExpr } from '../value/model.js'
import { normalizeTokens, type NormalizeContext } from '../value/normalize.js'
import type {
  ContextCondition,
  Guard,
  Notification,
  NotificationTiming,
  Property,
  ResourceDeclaration,
} from './model.js'

export type ExtractArgs = {
  readonly source: string
  readonly text: string
  /** Types recognized without a `do` block (`package 'curl'`). Block-form declarations are recognized for any type. */
  readonly knownTypes?: ReadonlySet<string>
  readonly constants?: ReadonlyMap<string, ValueExpr>
}

export type ExtractResult = {
  readonly declarations: ReadonlyArray<ResourceDeclaration>
  /** Constants and simple locals as they stand at the end of the file. */
  readonly constants: ReadonlyMap<string, ValueExpr>
  readonly diagnostics: ReadonlyArray<Diagnostic>
}

/** Heads that take a name argument and a block but never declare a resource. */
const NOT_RESOURCES: ReadonlySet<string> = new Set([
  'action',
  'action_class',
  'attribute',
  'describe',
  'context',
  'it',
  'load_current_value',
  'property',
  'raise',
  'require',
  'require_relative',
  'puts',
  'p',
  'pp',
])

const ITERATORS: ReadonlySet<string> = new Set([
  'each',
  'each_with_index',
  'each_pair',
  'each_key',
  'each_value',
  'each_slice',
  'each_with_object',
  'map',
  'flat_map',
  'select',
  'times',
  'upto',
  'downto',
  'step',
  'loop',
])

/** Token after a head word that makes the statement an expression (`x = 1`, `a.b`, `h[:k]`) rather than a call. */
const continuesExpression = (token: Token | undefined): boolean =>
  isPunct(token, '=', '.', '&.', '::', '<<', '+=', '-=', '||=', '&&=', '==') ||
  (isPunct(token, '[') && token !== undefined && !token.spaceBefore)

const IMMEDIATE_TIMINGS: ReadonlySet<string> = new Set(['immediately', 'immediate', 'before'])

type Scope = {
  readonly context: ReadonlyArray<ContextCondition>
  readonly loop: boolean
}

type Body = {
  readonly actions: string[]
  readonly properties: Property[]
  readonly guards: Guard[]
  readonly notifications: Notification[]
  readonly diagnostics: Diagnostic[]
}

export const extractFromProgram = (args: {
  readonly source: string
  readonly program: ParsedProgram
  readonly knownTypes: ReadonlySet<string>
  readonly constants: ReadonlyMap<string, ValueExpr>
}): ExtractResult => {
  const { source, program } = args
  const { text, lines } = program
  const constants = new Map(args.constants)
  const declarations: ResourceDeclaration[] = []
  const diagnostics: Diagnostic[] = program.problems.map((p) =>
    makeDiagnostic({ kind: 'StructuralParseError', code: p.code, message: p.message, source, span: spanAtOffset(lines, p.offset) }),
  )

  const ctx = (): NormalizeContext => ({ source, text, lines, constants })

  const spanOf = (start: number, end: number): Span => spanOfRange(lines, start, end)

  const tokenSpan = (tokens: ReadonlyArray<Token>, fallback: number): Span => {
    const first = tokens[0]
    const last = tokens[tokens.length - 1]
    return spanOf(first?.start ?? fallback, last?.end ?? fallback)
  }

  const warn = (code: ReasonCode, message: string, span: Span): Diagnostic =>
    makeDiagnostic({ kind: 'UnrecognizedConstruct', code, message, source, span })

  const normalize = (tokens: ReadonlyArray<Token>, sink: Diagnostic[]): ValueExpr => {
    const out = normalizeTokens(ctx(), tokens)
    sink.push(...out.diagnostics)
    return out.value
  }

  const blockCode = (block: Block, fallbackEnd: number): string =>
    text.slice(block.open.end, block.close?.start ?? fallbackEnd).replace(/^\s*\|[^|]*\|/, '').trim()

  const positional = (argsOf: ReadonlyArray<Argument>): ReadonlyArray<ReadonlyArray<Token>> =>
    argsOf.flatMap((a) => (a.kind === 'positional' ? [a.tokens] : []))

  const actionNames = (value: ValueExpr): ReadonlyArray<string> | undefined => {
    const single = literalString(value)
    if (single !== undefined) return [single]
    if (value.kind !== 'List') return undefined
    const names = value.items.map(literalString)
    return names.every((n): n is string => n !== undefined) ? names : undefined
  }

  /** `resources(service: 'nginx')` and `resources('service[nginx]')` targets. */
  const resourcesCallTarget = (tokens: ReadonlyArray<Token>, sink: Diagnostic[]): ValueExpr | undefined => {
    if (!isIdent(tokens[0], 'resources')) return undefined
    const call = readCall(tokens)
    if (call === undefined || call.trailing.length > 0) return undefined
    const [arg] = call.args
    if (arg === undefined || call.args.length !== 1) return undefined
    if (arg.kind === 'positional') return normalize(arg.tokens, sink)
    return interpolation([literal(`${arg.key}[`), normalize(arg.tokens, sink), literal(']')])
  }

  const parseNotification = (
    direction: 'notifies' | 'subscribes',
    stmt: CommandStatement,
    argsOf: ReadonlyArray<Argument>,
    body: Body,
  ): void => {
    const span = spanOf(stmt.start, stmt.end)
    const [actionTokens, targetTokens, timingTokens] = positional(argsOf)
    if (actionTokens === undefined || targetTokens === undefined) {
      body.diagnostics.push(warn(ReasonCodes.notifyMalformed, `'${direction}' needs an action and a target`, span))
      return
    }
    const action = literalString(normalize(actionTokens, body.diagnostics))
    if (action === undefined) {
      body.diagnostics.push(warn(ReasonCodes.notifyMalformed, `'${direction}' action is not a literal symbol`, span))
      return
    }
    const target = resourcesCallTarget(targetTokens, body.diagnostics) ?? normalize(targetTokens, body.diagnostics)

    let declaredTiming = 'delayed'
    if (timingTokens !== undefined) {
      const timing = literalString(normalize(timingTokens, body.diagnostics))
      if (timing === undefined || (timing !== 'delayed' && !IMMEDIATE_TIMINGS.has(timing))) {
        body.diagnostics.push(
          warn(ReasonCodes.notifyMalformed, `unknown notification timing '${sourceOf(text, timingTokens)}', using delayed`, span),
        )
      } else {
        declaredTiming = timing
      }
    }
    if (declaredTiming === 'before') {
      body.diagnostics.push(
        warn(ReasonCodes.notifyBeforeTiming, `':before' timing has no direct equivalent; treated as immediate`, span),
      )
    }
    const timing: NotificationTiming = IMMEDIATE_TIMINGS.has(declaredTiming) ? 'immediately' : 'delayed'
    body.notifications.push({ action, target, timing, declaredTiming, direction, span })
  }

  const parseGuard = (kind: 'only_if' | 'not_if', stmt: CommandStatement, argsOf: ReadonlyArray<Argument>, body: Body): void => {
    const span = spanOf(stmt.start, stmt.end)
    if (stmt.block !== undefined) {
      const code = blockCode(stmt.block, stmt.end)
      body.guards.push({ kind, form: { kind: 'Block', body: opaque(code), code }, span })
      return
    }
    const [commandTokens] = positional(argsOf)
    if (commandTokens === undefined) {
      body.diagnostics.push(warn(ReasonCodes.guardManualReview, `'${kind}' without a command or block`, span))
      return
    }
    const command = normalize(commandTokens, body.diagnostics)
    if (command.kind === 'Literal' || command.kind === 'Interpolation' || command.kind === 'AttributePath') {
      body.guards.push({ kind, form: { kind: 'Command', command }, span })
      return
    }
    // arrays, lambdas and the like: keep the source for the block translator
    const code = sourceOf(text, commandTokens)
    body.guards.push({ kind, form: { kind: 'Block', body: opaque(code), code }, span })
  }

  const parseBodyStatement = (stmt: Statement, body: Body, inConditional: boolean): void => {
    if (stmt.kind === 'conditional') {
      body.diagnostics.push(
        warn(
          ReasonCodes.declarationConditionalProperty,
          'properties set under a condition inside a resource block; only the first branch is used',
          spanOf(stmt.start, stmt.end),
        ),
      )
      const first = stmt.branches[0]
      if (first !== undefined) first.body.forEach((s) => parseBodyStatement(s, body, true))
      return
    }
    if (stmt.kind === 'compound') {
      body.diagnostics.push(
        warn(ReasonCodes.statementUnrecognized, `'${stmt.keyword}' inside a resource block was not converted`, spanOf(stmt.start, stmt.end)),
      )
      return
    }

    if (stmt.modifier !== undefined) {
      body.diagnostics.push(
        warn(
          ReasonCodes.declarationConditionalProperty,
          `property set under a trailing '${stmt.modifier.keyword}' inside a resource block; kept as if the condition held`,
          spanOf(stmt.start, stmt.end),
        ),
      )
    }
    const conditional = inConditional || stmt.modifier !== undefined

    const head = stmt.tokens[0]
    const call = readCall(stmt.tokens)
    if (head === undefined || head.kind !== 'ident' || call === undefined || call.trailing.length > 0 || continuesExpression(stmt.tokens[1])) {
      body.diagnostics.push(
        warn(ReasonCodes.statementUnrecognized, `statement '${sourceOf(text, stmt.tokens)}' inside a resource block was not converted`, spanOf(stmt.start, stmt.end)),
      )
      return
    }

    switch (head.value) {
      case 'action': {
        const [actionTokens] = positional(call.args)
        const value = actionTokens !== undefined ? normalize(actionTokens, body.diagnostics) : undefined
        const names = value !== undefined ? actionNames(value) : undefined
        if (names === undefined) {
          body.diagnostics.push(
            warn(ReasonCodes.valueUnrecognized, `action '${sourceOf(text, stmt.tokens.slice(1))}' is not a literal symbol`, spanOf(stmt.start, stmt.end)),
          )
          return
        }
        if (conditional) body.actions.length = 0
        body.actions.push(...names)
        return
      }
      case 'only_if':
      case 'not_if':
        parseGuard(head.value, stmt, call.args, body)
        return
      case 'notifies':
      case 'subscribes':
        parseNotification(head.value, stmt, call.args, body)
        return
    }

    const span = spanOf(stmt.start, stmt.end)
    if (stmt.block !== undefined) {
      // `block do ... end` in ruby_block and similar: code, not data
      const raw = text.slice(stmt.tokens[1]?.start ?? stmt.block.open.start, stmt.block.close?.end ?? stmt.end)
      body.properties.push({ name: head.value, value: opaque(raw), span })
      body.diagnostics.push(warn(ReasonCodes.valueUnrecognized, `'${head.value}' takes a code block, kept as-is`, span))
      return
    }
    if (call.args.length === 0) {
      body.properties.push({ name: head.value, value: literal(true), span })
      return
    }
    const [only] = call.args
    const keywords = call.args.flatMap((a) => (a.kind === 'keyword' ? [a] : []))
    const value =
      call.args.length === 1 && only !== undefined && only.kind === 'positional'
        ? normalize(only.tokens, body.diagnostics)
        : keywords.length === call.args.length
          ? map(keywords.map((a) => ({ key: a.key, value: normalize(a.tokens, body.diagnostics) })))
          : list(positional(call.args).map((tokens) => normalize(tokens, body.diagnostics)))
    body.properties.push({ name: head.value, value, span })
  }

  const declare = (type: string, stmt: CommandStatement, nameTokens: ReadonlyArray<Token>, scope: Scope): void => {
    const local: Diagnostic[] = []
    const nameExpression = normalize(nameTokens, local)
    const body: Body = { actions: [], properties: [], guards: [], notifications: [], diagnostics: local }
    if (stmt.block !== undefined) stmt.block.body.forEach((s) => parseBodyStatement(s, body, false))

    const span = spanOf(stmt.start, stmt.end)
    if (scope.loop) {
      local.push(
        warn(ReasonCodes.declarationInLoop, `${type} is declared inside a loop; the loop is not expanded`, span),
      )
      if (scope.context.length > 0) {
        local.push(
          warn(ReasonCodes.declarationNestedControlFlow, `${type} sits under a condition inside a loop; review the generated condition`, span),
        )
      }
    }
    const malformed = stmt.block !== undefined && stmt.block.close === undefined
    const ref = formatResourceRef(type, nameExpression)
    diagnostics.push(...local.map((d) => withResourceRef(d, ref)))
    declarations.push({
      type,
      nameExpression,
      actions: body.actions,
      properties: body.properties,
      guards: body.guards,
      notifications: body.notifications,
      context: scope.context,
      loop: scope.loop,
      malformed,
      usesSearch: /\bsearch\s*\(/.test(text.slice(stmt.start, stmt.end)),
      span,
      source,
    })
  }

  const isIterator = (stmt: CommandStatement): boolean => {
    if (isIdent(stmt.tokens[0], 'loop')) return true
    return stmt.tokens.some((t, k) => {
      const prev = stmt.tokens[k - 1]
      return t.kind === 'ident' && ITERATORS.has(t.value) && isPunct(prev, '.', '&.')
    })
  }

  const recordAssignment = (stmt: CommandStatement): boolean => {
    const [target, eq] = stmt.tokens
    if (target === undefined || !isPunct(eq, '=') || (target.kind !== 'const' && target.kind !== 'ident')) return false
    if (stmt.block !== undefined) return true
    // value depends on a converge-time condition
    if (stmt.modifier !== undefined) {
      constants.delete(target.value)
      return true
    }
    const out = normalizeTokens(ctx(), stmt.tokens.slice(2))
    if (out.value.kind === 'Opaque') constants.delete(target.value)
    else constants.set(target.value, out.value)
    return true
  }

  /** Scope of a statement carrying a trailing modifier: `if`/`unless` add a condition, `while`/`until` a loop. */
  const modifiedScope = (stmt: CommandStatement, scope: Scope): Scope => {
    const modifier = stmt.modifier
    if (modifier === undefined) return scope
    if (modifier.keyword === 'while' || modifier.keyword === 'until') return { context: scope.context, loop: true }
    const condition: ContextCondition = {
      kind: 'test',
      code: sourceOf(text, modifier.condition),
      negated: modifier.keyword === 'unless',
      span: tokenSpan(modifier.condition, modifier.start),
    }
    return { context: [...scope.context, condition], loop: scope.loop }
  }

  const walkCommand = (stmt: CommandStatement, outer: Scope): void => {
    if (recordAssignment(stmt)) return
    const scope = modifiedScope(stmt, outer)
    const head = stmt.tokens[0]
    const call = readCall(stmt.tokens)
    const span = spanOf(stmt.start, stmt.end)

    if (head !== undefined && head.kind === 'ident' && call !== undefined && call.trailing.length === 0) {
      const names = positional(call.args)
      const [nameTokens] = names
      if (head.value === 'include_recipe' && nameTokens !== undefined) {
        declare('include_recipe', stmt, nameTokens, scope)
        return
      }
      const looksLikeResource =
        !NOT_RESOURCES.has(head.value) &&
        names.length === 1 &&
        nameTokens !== undefined &&
        !continuesExpression(stmt.tokens[1]) &&
        (stmt.block !== undefined || args.knownTypes.has(head.value))
      if (looksLikeResource) {
        declare(head.value, stmt, nameTokens, scope)
        return
      }
    }

    if (stmt.block !== undefined) {
      const loop = isIterator(stmt)
      if (!loop) {
        diagnostics.push(
          warn(ReasonCodes.statementUnrecognized, `block owner '${sourceOf(text, stmt.tokens)}' was not converted; its body is still scanned`, span),
        )
      }
      walk(stmt.block.body, { context: scope.context, loop: scope.loop || loop })
      return
    }
    diagnostics.push(
      warn(ReasonCodes.statementUnrecognized, `statement '${sourceOf(text, stmt.tokens)}' was not converted`, span),
    )
  }

  const negate = (condition: ContextCondition): ContextCondition => ({ ...condition, negated: !condition.negated })

  const walkConditional = (stmt: ConditionalStatement, scope: Scope): void => {
    const prior: ContextCondition[] = []
    const subject = sourceOf(text, stmt.subject)
    for (const branch of stmt.branches) {
      const span = tokenSpan(branch.condition, branch.start)
      let condition: ContextCondition | undefined
      if (branch.keyword === 'when' && subject !== '') {
        const values = splitWhenValues(branch.condition)
        condition = { kind: 'match', subject, values, negated: false, span }
      } else if (branch.keyword !== 'else') {
        condition = { kind: 'test', code: sourceOf(text, branch.condition), negated: branch.keyword === 'unless', span }
      }
      const context = [...scope.context, ...prior, ...(condition !== undefined ? [condition] : [])]
      walk(branch.body, { context, loop: scope.loop })
      if (condition !== undefined) prior.push(negate(condition))
    }
  }

  const splitWhenValues = (tokens: ReadonlyArray<Token>): ReadonlyArray<string> => {
    const out: string[] = []
    let current: Token[] = []
    let depth = 0
    for (const t of tokens) {
      if (isPunct(t, '(', '[', '{')) depth++
      if (isPunct(t, ')', ']', '}')) depth--
      if (depth === 0 && isPunct(t, ',')) {
        out.push(sourceOf(text, current))
        current = []
        continue
      }
      current.push(t)
    }
    if (current.length > 0) out.push(sourceOf(text, current))
    return out
  }

  const walk = (statements: ReadonlyArray<Statement>, scope: Scope): void => {
    for (const stmt of statements) {
      switch (stmt.kind) {
        case 'command':
          walkCommand(stmt, scope)
          break
        case 'conditional':
          walkConditional(stmt, scope)
          break
        case 'compound':
          if (stmt.keyword === 'begin') walk(stmt.body, scope)
          else if (stmt.keyword === 'while' || stmt.keyword === 'until' || stmt.keyword === 'for') {
            walk(stmt.body, { context: scope.context, loop: true })
          }
          break
      }
    }
  }

  walk(program.statements, { context: [], loop: false })
  return { declarations, constants, diagnostics }
}

/** Block Extractor entry: ordered resource declarations of one recipe file. */
export const extractDeclarations = (args: ExtractArgs): ExtractResult =>
  extractFromProgram({
    source: args.source,
    program: parseProgram(args.text),
    knownTypes: args.knownTypes ?? new Set(),
    constants: args.constants ?? new Map(),
  })
