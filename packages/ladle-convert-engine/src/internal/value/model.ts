export type AttributeScope =
  | 'node'
  | 'default'
  | 'force_default'
  | 'normal'
  | 'override'
  | 'force_override'
  | 'automatic'
  | 'set'
  | 'new_resource'

export const ATTRIBUTE_SCOPES: ReadonlyArray<AttributeScope> = [
  'node',
  'default',
  'force_default',
  'normal',
  'override',
  'force_override',
  'automatic',
  'set',
  'new_resource',
]

export const isAttributeScope = (name: string): name is AttributeScope =>
  ATTRIBUTE_SCOPES.some((scope) => scope === name)

export type Scalar = string | number | boolean | null

export type LiteralValue = {
  readonly kind: 'Literal'
  readonly value: Scalar
  /** Written as a symbol (`:name`) in the source. */
  readonly symbol?: true
}

export type AttributePathValue = {
  readonly kind: 'AttributePath'
  readonly scope: AttributeScope
  readonly keys: ReadonlyArray<string>
}

export type InterpolationValue = {
  readonly kind: 'Interpolation'
  readonly segments: ReadonlyArray<ValueExpr>
}

export type ListValue = {
  readonly kind: 'List'
  readonly items: ReadonlyArray<ValueExpr>
}

export type MapEntry = { readonly key: string; readonly value: ValueExpr }

export type MapValue = {
  readonly kind: 'Map'
  readonly entries: ReadonlyArray<MapEntry>
}

export type OpaqueValue = {
  readonly kind: 'Opaque'
  /** Exact source text of the expression. */
  readonly raw: string
}

export type ValueExpr = LiteralValue | AttributePathValue | InterpolationValue | ListValue | MapValue | OpaqueValue

export type TaskValue = string | number | boolean | null | ReadonlyArray<TaskValue> | { readonly [key: string]: TaskValue }

export const literal = (value: Scalar): LiteralValue => ({ kind: 'Literal', value })

export const symbol = (name: string): LiteralValue => ({ kind: 'Literal', value: name, symbol: true })

export const attributePath = (scope: AttributeScope, keys: ReadonlyArray<string>): AttributePathValue => ({
  kind: 'AttributePath',
  scope,
  keys,
})

export const list = (items: ReadonlyArray<ValueExpr>): ListValue => ({ kind: 'List', items })

export const map = (entries: ReadonlyArray<MapEntry>): MapValue => ({ kind: 'Map', entries })

export const opaque = (raw: string): OpaqueValue => ({ kind: 'Opaque', raw })

/**
 * Interpolation with adjacent literal text merged; collapses to a single string literal when nothing dynamic is left.
 */
export const interpolation = (segments: ReadonlyArray<ValueExpr>): InterpolationValue | LiteralValue => {
  const merged: ValueExpr[] = []
  for (const segment of segments) {
    const parts = segment.kind === 'Interpolation' ? segment.segments : [segment]
    for (const part of parts) {
      const prev = merged[merged.length - 1]
      if (part.kind === 'Literal' && part.value !== null && prev !== undefined && prev.kind === 'Literal') {
        merged[merged.length - 1] = literal(`${scalarText(prev.value)}${scalarText(part.value)}`)
        continue
      }
      if (part.kind === 'Literal' && (part.value === null || part.value === '')) continue
      merged.push(part.kind === 'Literal' && part.symbol ? literal(scalarText(part.value)) : part)
    }
  }
  if (merged.length === 0) return literal('')
  const only = merged[0]
  if (merged.length === 1 && only !== undefined && only.kind === 'Literal') return literal(scalarText(only.value))
  return { kind: 'Interpolation', segments: merged }
}

export const scalarText = (value: Scalar): string => (value === null ? '' : String(value))

/** Opaque pieces anywhere inside the value. */
export const collectOpaque = (value: ValueExpr): ReadonlyArray<OpaqueValue> => {
  switch (value.kind) {
    case 'Opaque':
      return [value]
    case 'Interpolation':
      return value.segments.flatMap(collectOpaque)
    case 'List':
      return value.items.flatMap(collectOpaque)
    case 'Map':
      return value.entries.flatMap((e) => collectOpaque(e.value))
    default:
      return []
  }
}

/** Plain string for literals (symbols included), `undefined` for anything dynamic. */
export const literalString = (value: ValueExpr): string | undefined =>
  value.kind === 'Literal' && value.value !== null ? String(value.value) : undefined
