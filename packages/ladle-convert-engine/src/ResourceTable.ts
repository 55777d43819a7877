import { Context, Effect, Layer, Option } from 'effect'

import { DEFAULT_RESOURCE_TABLE, type ResourceTableEntries } from './internal/mapping/resourceTable.js'

export type { ActionEffect, ResourceMapping, ResourceTableEntries } from './internal/mapping/resourceTable.js'

export interface ResourceTableShape {
  readonly entries: ResourceTableEntries
}

export class ResourceTableTag extends Context.Tag('@ladle/convert-engine/ResourceTable')<ResourceTableTag, ResourceTableShape>() {}

export const defaults: ResourceTableEntries = DEFAULT_RESOURCE_TABLE

/** Adds or overrides entries on top of the current table (the built-in one when none is provided). */
export const extend = (entries: ResourceTableEntries): Layer.Layer<ResourceTableTag> =>
  Layer.effect(
    ResourceTableTag,
    Effect.gen(function* () {
      const current = yield* Effect.serviceOption(ResourceTableTag)
      const base = Option.isSome(current) ? current.value.entries : DEFAULT_RESOURCE_TABLE
      return { entries: { ...base, ...entries } }
    }),
  )

export const load: Effect.Effect<ResourceTableEntries> = Effect.gen(function* () {
  const current = yield* Effect.serviceOption(ResourceTableTag)
  return Option.isSome(current) ? current.value.entries : DEFAULT_RESOURCE_TABLE
})
