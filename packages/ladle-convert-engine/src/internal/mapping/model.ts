import type { BoolExpr } from '../guard/model.js'
import type { Span } from '../span.js'
import type { TaskValue } from '../value/model.js'

export type Complexity = 'simple' | 'moderate' | 'complex'

export type TaskParameters = { readonly [param: string]: TaskValue }

/** Task keywords outside the module parameters (`ignore_errors`, `no_log`, `become_user`, `vars`, ...). */
export type TaskKeywords = { readonly [keyword: string]: TaskValue }

/** Action run right after the triggering task (immediate notification). */
export type PostActionTask = {
  readonly targetRef: string
  readonly action: string
  readonly module: string
  readonly parameters: TaskParameters
  /** The target declaration's own condition, as on delayed handlers. */
  readonly condition?: BoolExpr
  readonly when?: string
  readonly resolved: boolean
}

export type ConvertedTask = {
  readonly name: string
  readonly module: string
  readonly parameters: TaskParameters
  readonly condition?: BoolExpr
  /** `condition` rendered as a `when:` expression. */
  readonly when?: string
  /** Names of the handlers this task notifies. */
  readonly notifyRefs: ReadonlyArray<string>
  readonly postActions: ReadonlyArray<PostActionTask>
  readonly keywords: TaskKeywords
  /** Warning messages attached to this declaration. */
  readonly rawWarnings: ReadonlyArray<string>
  /** Declared with `:nothing`: only runs when notified. */
  readonly notifyOnly: boolean
  readonly complexity: Complexity
  readonly source: {
    readonly file: string
    readonly span: Span
    /** `type[name]` */
    readonly ref: string
  }
}

export type Handler = {
  readonly name: string
  readonly targetRef: string
  readonly action: string
  readonly module: string
  readonly parameters: TaskParameters
  readonly condition?: BoolExpr
  readonly when?: string
  /** The target is declared in the same recipe. */
  readonly resolved: boolean
  /** Refs of the resources that notify this handler. */
  readonly triggeredBy: ReadonlyArray<string>
  readonly span: Span
}
