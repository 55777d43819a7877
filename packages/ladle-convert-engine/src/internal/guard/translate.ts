import { makeDiagnostic, type Diagnostic } from '../diagnostics.js'
import type { ContextCondition, Guard } from '../extract/model.js'
import { ReasonCodes } from '../reasonCodes.js'
import { collectOpaque, type ValueExpr } from '../value/model.js'
import { render } from '../value/render.js'
import { parseCondition, parseMatch } from './blockCondition.js'
import { matchCommand } from './commandPatterns.js'
import { Not, OpaqueBool, type BoolExpr } from './model.js'

export type Translated = {
  readonly expr: BoolExpr
  readonly diagnostics: ReadonlyArray<Diagnostic>
}

export type TranslateOptions = {
  readonly source?: string
  readonly constants?: ReadonlyMap<string, ValueExpr>
}

const onlyIfExpr = (guard: Guard, constants: ReadonlyMap<string, ValueExpr>): BoolExpr | undefined => {
  if (guard.form.kind === 'Command') {
    const command = guard.form.command
    return collectOpaque(command).length > 0 ? undefined : matchCommand(command)
  }
  return parseCondition(guard.form.code, constants)
}

const rawOf = (guard: Guard): string => (guard.form.kind === 'Command' ? render(guard.form.command) : guard.form.code)

/**
 * Guard to boolean expression. `not_if` is always the negation of the `only_if` reading of the same form;
 * unrecognized forms stay opaque with a manual-review warning.
 */
export const translate = (guard: Guard, options: TranslateOptions = {}): Translated => {
  const constants = options.constants ?? new Map<string, ValueExpr>()
  const recognized = onlyIfExpr(guard, constants)
  const diagnostics: Diagnostic[] = []
  let expr: BoolExpr
  if (recognized !== undefined) {
    expr = recognized
  } else {
    const raw = rawOf(guard)
    expr = OpaqueBool(raw)
    diagnostics.push(
      makeDiagnostic({
        kind: 'UnrecognizedConstruct',
        code: ReasonCodes.guardManualReview,
        message: `${guard.kind} '${raw}' could not be translated; manual review required`,
        source: options.source ?? '',
        span: guard.span,
      }),
    )
  }
  return { expr: guard.kind === 'not_if' ? Not(expr) : expr, diagnostics }
}

/** Enclosing `if`/`unless`/`case` branch to a condition. */
export const translateContext = (condition: ContextCondition, options: TranslateOptions = {}): Translated => {
  const constants = options.constants ?? new Map<string, ValueExpr>()
  const recognized =
    condition.kind === 'test' ? parseCondition(condition.code, constants) : parseMatch(condition.subject, condition.values, constants)
  const raw = condition.kind === 'test' ? condition.code : `${condition.subject} in [${condition.values.join(', ')}]`
  const diagnostics: Diagnostic[] = []
  let expr: BoolExpr
  if (recognized !== undefined) {
    expr = recognized
  } else {
    expr = OpaqueBool(raw)
    diagnostics.push(
      makeDiagnostic({
        kind: 'UnrecognizedConstruct',
        code: ReasonCodes.guardConditionOpaque,
        message: `enclosing condition '${raw}' could not be translated; manual review required`,
        source: options.source ?? '',
        span: condition.span,
      }),
    )
  }
  return { expr: condition.negated ? Not(expr) : expr, diagnostics }
}
