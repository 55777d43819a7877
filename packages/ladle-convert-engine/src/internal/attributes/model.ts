import type { Span } from '../span.js'
import type { ValueExpr } from '../value/model.js'

export type Precedence = 'default' | 'force_default' | 'normal' | 'override' | 'force_override' | 'automatic'

/** Total order, highest wins: automatic > force_override > override > force_default > normal > default. */
export const PrecedenceRank: { readonly [P in Precedence]: number } = {
  default: 0,
  normal: 1,
  force_default: 2,
  override: 3,
  force_override: 4,
  automatic: 5,
}

export const PRECEDENCES: ReadonlyArray<Precedence> = ['default', 'force_default', 'normal', 'override', 'force_override', 'automatic']

export const isPrecedence = (name: string): name is Precedence => PRECEDENCES.some((p) => p === name)

export type AttributeAssignment = {
  readonly precedence: Precedence
  readonly keyPath: ReadonlyArray<string>
  readonly value: ValueExpr
  /** Declaration order across all scanned files; the array position is used when absent. */
  readonly index?: number
  readonly source?: string
  readonly span?: Span
  /** Made under an `if`/`case` whose outcome is only known at converge time. */
  readonly conditional?: boolean
}

export type EffectiveAttribute = {
  readonly keyPath: ReadonlyArray<string>
  readonly value: ValueExpr
  readonly winningPrecedence: Precedence
  readonly source?: string
  readonly span?: Span
}

export const keyPathId = (keyPath: ReadonlyArray<string>): string => keyPath.join('\u0000')
