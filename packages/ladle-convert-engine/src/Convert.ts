import { Effect } from 'effect'

import { ConvertConfig } from './Config.js'
import * as ResourceTable from './ResourceTable.js'
import { prepareCookbook, type PreparedCookbook } from './internal/convert/cookbook.js'
import type {
  CookbookConversionV1,
  PhaseEvent,
  RecipeConversionV1,
  ResourceSource,
  SourceText,
} from './internal/convert/model.js'
import { convertRecipeText, type RecipeEnvironment } from './internal/convert/recipe.js'
import { countBySeverity, type Diagnostic } from './internal/diagnostics.js'
import { sortBySourceSpan } from './internal/stableSort.js'

export type {
  ConversionSettings,
  CookbookConversionV1,
  PhaseEvent,
  PhaseName,
  RecipeConversionV1,
  ResourceSource,
  SourceText,
} from './internal/convert/model.js'
export type { Complexity, ConvertedTask, Handler, PostActionTask, TaskKeywords, TaskParameters } from './internal/mapping/model.js'

export type ConvertRecipeArgs = SourceText & {
  /** Used to derive custom resource type names (`<cookbook>_<file>`). */
  readonly cookbookName?: string
  readonly attributeFiles?: ReadonlyArray<SourceText>
  readonly resourceFiles?: ReadonlyArray<ResourceSource>
}

export type ConvertCookbookArgs = {
  readonly cookbookName?: string
  readonly recipes: ReadonlyArray<SourceText>
  readonly attributeFiles?: ReadonlyArray<SourceText>
  readonly resourceFiles?: ReadonlyArray<ResourceSource>
}

const logPhases = (phases: ReadonlyArray<PhaseEvent>): Effect.Effect<void> =>
  Effect.forEach(phases, (event) => Effect.logDebug(`phase ${event.phase}`).pipe(Effect.annotateLogs(event.counts)), {
    discard: true,
  })

const logErrors = (diagnostics: ReadonlyArray<Diagnostic>): Effect.Effect<void> =>
  Effect.forEach(
    diagnostics.filter((d) => d.severity === 'error'),
    (d) =>
      Effect.logWarning(`${d.code}: ${d.message}`).pipe(
        Effect.annotateLogs({ file: d.source, line: d.span.start.line, column: d.span.start.column }),
      ),
    { discard: true },
  )

const environment = Effect.gen(function* () {
  const settings = yield* ConvertConfig.load
  const table = yield* ResourceTable.load
  return { settings, table }
})

const prepare = (args: {
  readonly cookbookName?: string
  readonly attributeFiles?: ReadonlyArray<SourceText>
  readonly resourceFiles?: ReadonlyArray<ResourceSource>
}): Effect.Effect<PreparedCookbook> =>
  Effect.gen(function* () {
    const prepared = prepareCookbook({
      ...(args.cookbookName !== undefined ? { cookbookName: args.cookbookName } : null),
      attributeFiles: args.attributeFiles ?? [],
      resourceFiles: args.resourceFiles ?? [],
    })
    yield* Effect.logDebug('cookbook prepared').pipe(
      Effect.annotateLogs({
        attributes: prepared.attributes.effective.length,
        customResources: prepared.definitions.size,
      }),
    )
    yield* logErrors(prepared.diagnostics)
    return prepared
  })

const runRecipe = (recipe: SourceText, env: RecipeEnvironment): Effect.Effect<RecipeConversionV1> =>
  Effect.gen(function* () {
    const run = convertRecipeText(recipe, env)
    yield* logPhases(run.phases)
    yield* logErrors(run.conversion.diagnostics)
    return run.conversion
  }).pipe(Effect.annotateLogs({ source: recipe.source }), Effect.withLogSpan('convertRecipe'))

/**
 * Converts one recipe. Attribute and resource files, when given, are parsed first; their diagnostics are merged into
 * the recipe's.
 */
export const convertRecipe = (args: ConvertRecipeArgs): Effect.Effect<RecipeConversionV1> =>
  Effect.gen(function* () {
    const { settings, table } = yield* environment
    const prepared = yield* prepare(args)
    const conversion = yield* runRecipe(
      { source: args.source, text: args.text },
      { settings, table, attributes: prepared.attributes, definitions: prepared.definitions },
    )
    if (prepared.diagnostics.length === 0) return conversion

    const diagnostics = sortBySourceSpan([...prepared.diagnostics, ...conversion.diagnostics])
    return {
      ...conversion,
      diagnostics,
      summary: {
        ...conversion.summary,
        errorsTotal: countBySeverity(diagnostics, 'error'),
        warningsTotal: countBySeverity(diagnostics, 'warning'),
      },
    }
  })

/** Parses attribute and resource files once and converts every recipe against the shared result, in input order. */
export const convertCookbook = (args: ConvertCookbookArgs): Effect.Effect<CookbookConversionV1> =>
  Effect.gen(function* () {
    const { settings, table } = yield* environment
    const prepared = yield* prepare(args)
    const env: RecipeEnvironment = { settings, table, attributes: prepared.attributes, definitions: prepared.definitions }
    const recipes = yield* Effect.forEach(args.recipes, (recipe) => runRecipe(recipe, env))

    const diagnostics = sortBySourceSpan(prepared.diagnostics)
    const sum = (pick: (r: RecipeConversionV1) => number): number => recipes.reduce((n, r) => n + pick(r), 0)
    const customResources = new Set(prepared.definitions.values()).size

    const conversion: CookbookConversionV1 = {
      schemaVersion: 1,
      kind: 'CookbookConversion',
      recipes,
      attributes: prepared.attributes.effective,
      diagnostics,
      summary: {
        recipesTotal: recipes.length,
        tasksTotal: sum((r) => r.summary.tasksTotal),
        handlersTotal: sum((r) => r.summary.handlersTotal),
        customResourcesTotal: customResources,
        errorsTotal: countBySeverity(diagnostics, 'error') + sum((r) => r.summary.errorsTotal),
        warningsTotal: countBySeverity(diagnostics, 'warning') + sum((r) => r.summary.warningsTotal),
      },
    }
    return conversion
  }).pipe(Effect.withLogSpan('convertCookbook'))
