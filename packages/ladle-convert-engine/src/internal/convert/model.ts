import type { EffectiveAttribute } from '../attributes/model.js'
import type { Diagnostic } from '../diagnostics.js'
import type { ConvertedTask, Handler } from '../mapping/model.js'

export type SourceText = {
  /** Identifier used in spans and diagnostics, usually a cookbook-relative path. */
  readonly source: string
  readonly text: string
}

export type ResourceSource = SourceText & {
  /** Type names this file provides in addition to its `resource_name`/`provides` lines. */
  readonly typeNames?: ReadonlyArray<string>
}

export type ConversionSettings = {
  readonly customModuleNamespace: string
  readonly fallbackModule: string
  readonly resolveAttributes: boolean
}

export type PhaseName = 'Unparsed' | 'Extracted' | 'Normalized' | 'Resolved' | 'Mapped' | 'Emitted'

/** Counts reported when a recipe enters a phase. */
export type PhaseEvent = {
  readonly phase: PhaseName
  readonly counts: { readonly [name: string]: number }
}

export type RecipeConversionV1 = {
  readonly schemaVersion: 1
  readonly kind: 'RecipeConversion'
  readonly source: string
  readonly tasks: ReadonlyArray<ConvertedTask>
  readonly handlers: ReadonlyArray<Handler>
  readonly diagnostics: ReadonlyArray<Diagnostic>
  readonly summary: {
    readonly declarationsTotal: number
    readonly tasksTotal: number
    readonly handlersTotal: number
    readonly errorsTotal: number
    readonly warningsTotal: number
    readonly complexity: {
      readonly simple: number
      readonly moderate: number
      readonly complex: number
    }
  }
}

export type CookbookConversionV1 = {
  readonly schemaVersion: 1
  readonly kind: 'CookbookConversion'
  readonly recipes: ReadonlyArray<RecipeConversionV1>
  readonly attributes: ReadonlyArray<EffectiveAttribute>
  /** Attribute and resource file diagnostics; recipe diagnostics stay on their recipe. */
  readonly diagnostics: ReadonlyArray<Diagnostic>
  readonly summary: {
    readonly recipesTotal: number
    readonly tasksTotal: number
    readonly handlersTotal: number
    readonly customResourcesTotal: number
    readonly errorsTotal: number
    readonly warningsTotal: number
  }
}
