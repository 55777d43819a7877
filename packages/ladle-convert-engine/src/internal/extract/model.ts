import type { Span } from '../span.js'
import type { ValueExpr } from '../value/model.js'

export type GuardKind = 'only_if' | 'not_if'

export type GuardForm =
  | { readonly kind: 'Command'; readonly command: ValueExpr }
  | {
      readonly kind: 'Block'
      /** `Opaque` holding the block body; translation works from `code`. */
      readonly body: ValueExpr
      readonly code: string
    }

export type Guard = {
  readonly kind: GuardKind
  readonly form: GuardForm
  readonly span: Span
}

export type NotificationTiming = 'immediately' | 'delayed'

export type Notification = {
  readonly action: string
  /** `'type[name]'` reference as written (after constant substitution). */
  readonly target: ValueExpr
  readonly timing: NotificationTiming
  /** `:before` and `:immediate` spellings are kept here; `timing` holds the effective value. */
  readonly declaredTiming: string
  readonly direction: 'notifies' | 'subscribes'
  readonly span: Span
}

/** Enclosing `if`/`unless`/`case` branch a declaration sits in. */
export type ContextCondition =
  | {
      readonly kind: 'test'
      readonly code: string
      readonly negated: boolean
      readonly span: Span
    }
  | {
      readonly kind: 'match'
      readonly subject: string
      readonly values: ReadonlyArray<string>
      readonly negated: boolean
      readonly span: Span
    }

export type Property = {
  readonly name: string
  readonly value: ValueExpr
  readonly span: Span
}

export type ResourceDeclaration = {
  readonly type: string
  readonly nameExpression: ValueExpr
  /** Empty means the type's default action. */
  readonly actions: ReadonlyArray<string>
  readonly properties: ReadonlyArray<Property>
  readonly guards: ReadonlyArray<Guard>
  readonly notifications: ReadonlyArray<Notification>
  readonly context: ReadonlyArray<ContextCondition>
  /** Declared inside an iterator block or loop. */
  readonly loop: boolean
  /** The resource block was never closed. */
  readonly malformed: boolean
  /** `search(...)` appears somewhere in the declaration. */
  readonly usesSearch: boolean
  readonly span: Span
  readonly source: string
}
