import { render } from '../value/render.js'
import type { ValueExpr } from '../value/model.js'

export type TargetRef = { readonly type: string; readonly name: string }

const REF_RE = /^\s*([A-Za-z_][A-Za-z0-9_:]*)\[(.*)\]\s*$/s

export const formatResourceRef = (type: string, name: ValueExpr): string => `${type}[${render(name)}]`

/** Splits `type[name]`; `undefined` when the text has another shape. */
export const parseTargetRef = (text: string): TargetRef | undefined => {
  const m = REF_RE.exec(text)
  if (m === null) return undefined
  const [, type = '', name = ''] = m
  return { type, name }
}
