import type { Diagnostic } from '../diagnostics.js'
import type { ValueExpr } from '../value/model.js'

export type PropertySchema = {
  readonly name: string
  /** Source text of the type constraint (`String`, `[String, Integer]`), when one is given. */
  readonly typeConstraint?: string
  readonly isNameProperty: boolean
  readonly default?: ValueExpr
  readonly required: boolean
  readonly sensitive: boolean
}

export type ResourceDefinition = {
  /** `resource_name`/`provides` names followed by the caller-supplied names, without duplicates. */
  readonly typeNames: ReadonlyArray<string>
  readonly properties: ReadonlyArray<PropertySchema>
  readonly actions: ReadonlyArray<string>
  readonly defaultAction?: string
  readonly diagnostics: ReadonlyArray<Diagnostic>
}

/** Name of the property the declaration's name fills: the marked one, or the implicit `name`. */
export const namePropertyOf = (properties: ReadonlyArray<PropertySchema>): string =>
  properties.find((p) => p.isNameProperty)?.name ?? 'name'
