import type { ValueExpr } from '../value/model.js'

export type TestKind =
  | 'path_exists'
  | 'file_exists'
  | 'directory_exists'
  | 'command_available'
  | 'service_active'
  | 'service_enabled'
  | 'process_running'
  | 'package_installed'
  | 'user_exists'
  | 'group_exists'
  | 'platform'
  | 'platform_family'

export type CompareOp = '==' | '!=' | '<' | '>' | '<=' | '>='

export type BoolExpr =
  | { readonly kind: 'Bool'; readonly value: boolean }
  | { readonly kind: 'Test'; readonly test: TestKind; readonly subject: ValueExpr }
  | { readonly kind: 'Compare'; readonly left: ValueExpr; readonly op: CompareOp; readonly right: ValueExpr }
  | { readonly kind: 'Truthy'; readonly value: ValueExpr }
  | { readonly kind: 'Not'; readonly expr: BoolExpr }
  | { readonly kind: 'And'; readonly exprs: ReadonlyArray<BoolExpr> }
  | { readonly kind: 'Or'; readonly exprs: ReadonlyArray<BoolExpr> }
  | { readonly kind: 'Opaque'; readonly raw: string }

export const Bool = (value: boolean): BoolExpr => ({ kind: 'Bool', value })

export const Test = (test: TestKind, subject: ValueExpr): BoolExpr => ({ kind: 'Test', test, subject })

export const Compare = (left: ValueExpr, op: CompareOp, right: ValueExpr): BoolExpr => ({ kind: 'Compare', left, op, right })

export const Truthy = (value: ValueExpr): BoolExpr => ({ kind: 'Truthy', value })

export const Not = (expr: BoolExpr): BoolExpr => ({ kind: 'Not', expr })

export const And = (exprs: ReadonlyArray<BoolExpr>): BoolExpr => ({ kind: 'And', exprs })

export const Or = (exprs: ReadonlyArray<BoolExpr>): BoolExpr => ({ kind: 'Or', exprs })

export const OpaqueBool = (raw: string): BoolExpr => ({ kind: 'Opaque', raw })

/** `undefined` for no conditions, the single condition itself, or `And` in the given order. */
export const allOf = (exprs: ReadonlyArray<BoolExpr>): BoolExpr | undefined => {
  if (exprs.length === 0) return undefined
  const [only] = exprs
  return exprs.length === 1 && only !== undefined ? only : And(exprs)
}

export const containsOpaque = (expr: BoolExpr): boolean => {
  switch (expr.kind) {
    case 'Opaque':
      return true
    case 'Not':
      return containsOpaque(expr.expr)
    case 'And':
    case 'Or':
      return expr.exprs.some(containsOpaque)
    default:
      return false
  }
}
