import type { AttributeTable } from '../attributes/table.js'
import { countBySeverity, makeDiagnostic, withResourceRef, type Diagnostic } from '../diagnostics.js'
import { extractFromProgram } from '../extract/extractDeclarations.js'
import type { ResourceDeclaration } from '../extract/model.js'
import { allOf, type BoolExpr } from '../guard/model.js'
import { renderWhen } from '../guard/render.js'
import { translate, translateContext } from '../guard/translate.js'
import { estimateComplexity } from '../mapping/complexity.js'
import { mapResource, type MappingContext } from '../mapping/mapResource.js'
import type { ConvertedTask, Handler, PostActionTask, TaskParameters } from '../mapping/model.js'
import { resolveDeclaration } from '../mapping/resolveDeclaration.js'
import type { ResourceTableEntries } from '../mapping/resourceTable.js'
import { taskName } from '../mapping/taskName.js'
import { buildGraph, type GraphNode } from '../notify/graph.js'
import { formatResourceRef, parseTargetRef } from '../notify/targetRef.js'
import { ReasonCodes } from '../reasonCodes.js'
import type { ResourceDefinition } from '../schema/model.js'
import type { Span } from '../span.js'
import { sortBySourceSpan } from '../stableSort.js'
import { parseProgram } from '../syntax/statements.js'
import { collectOpaque, literal } from '../value/model.js'
import { render } from '../value/render.js'
import type { ConversionSettings, PhaseEvent, RecipeConversionV1, SourceText } from './model.js'

export type RecipeEnvironment = {
  readonly settings: ConversionSettings
  readonly table: ResourceTableEntries
  readonly attributes: AttributeTable | undefined
  readonly definitions: ReadonlyMap<string, ResourceDefinition>
}

export type RecipeRun = {
  readonly conversion: RecipeConversionV1
  readonly phases: ReadonlyArray<PhaseEvent>
}

const SEARCH_RECOMMENDATION =
  'search() queries the Chef server at converge time; build the host list from inventory groups or ansible.builtin.add_host and filter it with a when condition'

/** Diagnostics of a notified action that the target task did not already report. */
const ACTION_CODES: ReadonlySet<string> = new Set([ReasonCodes.mappingUnsupportedAction, ReasonCodes.schemaUnknownAction])

const within = (inner: Span, outer: Span): boolean =>
  inner.start.offset >= outer.start.offset && inner.end.offset <= outer.end.offset

type Prepared = {
  readonly declaration: ResourceDeclaration
  readonly ref: string
  readonly condition: BoolExpr | undefined
  readonly diagnostics: ReadonlyArray<Diagnostic>
}

export const convertRecipeText = (input: SourceText, env: RecipeEnvironment): RecipeRun => {
  const { source } = input
  const phases: PhaseEvent[] = []
  const enter = (phase: PhaseEvent['phase'], counts: PhaseEvent['counts']): void => {
    phases.push({ phase, counts })
  }

  enter('Unparsed', { bytes: input.text.length })

  const knownTypes = new Set([...Object.keys(env.table), ...env.definitions.keys()])
  const extracted = extractFromProgram({ source, program: parseProgram(input.text), knownTypes, constants: new Map() })
  enter('Extracted', {
    declarations: extracted.declarations.length,
    errors: countBySeverity(extracted.diagnostics, 'error'),
  })

  const opaqueValues = extracted.declarations.reduce(
    (n, d) => n + [d.nameExpression, ...d.properties.map((p) => p.value)].reduce((m, v) => m + collectOpaque(v).length, 0),
    0,
  )
  enter('Normalized', { declarations: extracted.declarations.length, opaqueValues })

  const translateOptions = { source, constants: extracted.constants }
  const prepared: Prepared[] = extracted.declarations.map((original) => {
    const resolved =
      env.settings.resolveAttributes && env.attributes !== undefined
        ? resolveDeclaration({ source, table: env.attributes, declaration: original })
        : { declaration: original, diagnostics: [] }
    const declaration = resolved.declaration
    const ref = formatResourceRef(declaration.type, declaration.nameExpression)
    const diagnostics: Diagnostic[] = [...resolved.diagnostics]
    const exprs: BoolExpr[] = []
    // enclosing conditions come before the resource's own guards
    for (const condition of declaration.context) {
      const out = translateContext(condition, translateOptions)
      exprs.push(out.expr)
      diagnostics.push(...out.diagnostics.map((d) => withResourceRef(d, ref)))
    }
    for (const guard of declaration.guards) {
      const out = translate(guard, translateOptions)
      exprs.push(out.expr)
      diagnostics.push(...out.diagnostics.map((d) => withResourceRef(d, ref)))
    }
    return { declaration, ref, condition: allOf(exprs), diagnostics }
  })
  enter('Resolved', {
    declarations: prepared.length,
    unresolved: prepared.reduce((n, p) => n + p.diagnostics.filter((d) => d.kind === 'UnresolvedReference').length, 0),
  })

  const nodes: GraphNode[] = prepared.map((p) => ({
    ref: p.ref,
    notifications: p.declaration.notifications.map((n) => ({
      action: n.action,
      targetRef: render(n.target),
      timing: n.timing,
      direction: n.direction,
      span: n.span,
    })),
  }))
  const graph = buildGraph({ source, nodes })

  const ctx: MappingContext = {
    source,
    table: env.table,
    definitions: env.definitions,
    customModuleNamespace: env.settings.customModuleNamespace,
    fallbackModule: env.settings.fallbackModule,
  }

  const defaultActionOf = (type: string): ReadonlyArray<string> => {
    const action = env.table[type]?.defaultAction ?? env.definitions.get(type)?.defaultAction
    return action !== undefined ? [action] : []
  }

  const stageDiagnostics: Diagnostic[] = []

  /** Module and parameters for running `action` on a target, declared here or elsewhere in the cookbook. */
  const runOn = (
    targetRef: string,
    action: string,
    targetIndex: number | undefined,
    span: Span,
  ): { readonly module: string; readonly parameters: TaskParameters; readonly target: Prepared | undefined } => {
    const target = targetIndex !== undefined ? prepared[targetIndex] : undefined
    if (target !== undefined) {
      const mapped = mapResource(ctx, target.declaration, [action])
      stageDiagnostics.push(...mapped.diagnostics.filter((d) => ACTION_CODES.has(d.code)).map((d) => ({ ...d, span })))
      return { module: mapped.module, parameters: mapped.parameters, target }
    }
    const parsed = parseTargetRef(targetRef)
    if (parsed === undefined) {
      return { module: ctx.fallbackModule, parameters: { cmd: `echo 'manual conversion required: ${targetRef}'` }, target }
    }
    const synthetic: ResourceDeclaration = {
      type: parsed.type,
      nameExpression: literal(parsed.name),
      actions: [action],
      properties: [],
      guards: [],
      notifications: [],
      context: [],
      loop: false,
      malformed: false,
      usesSearch: false,
      span,
      source,
    }
    const mapped = mapResource(ctx, synthetic)
    stageDiagnostics.push(...mapped.diagnostics)
    return { module: mapped.module, parameters: mapped.parameters, target }
  }

  const tasks: ConvertedTask[] = prepared.map((p, i) => {
    const decl = p.declaration
    const mapped = mapResource(ctx, decl)
    const own: Diagnostic[] = [...p.diagnostics, ...mapped.diagnostics]
    if (decl.usesSearch) {
      own.push(
        makeDiagnostic({
          kind: 'UnrecognizedConstruct',
          code: ReasonCodes.mappingSearchQuery,
          message: SEARCH_RECOMMENDATION,
          source,
          span: decl.span,
          resourceRef: p.ref,
        }),
      )
    }
    stageDiagnostics.push(...own)

    const extractedWarnings = extracted.diagnostics.filter((d) => d.severity === 'warning' && within(d.span, decl.span))
    const graphWarnings = graph.diagnostics.filter((d) => d.resourceRef === p.ref)
    const postActions: PostActionTask[] = (graph.postActions[i] ?? []).map((post) => {
      const run = runOn(post.targetRef, post.action, post.targetIndex, decl.span)
      const condition = run.target?.condition
      return {
        targetRef: post.targetRef,
        action: post.action,
        module: run.module,
        parameters: run.parameters,
        ...(condition !== undefined ? { condition, when: renderWhen(condition) } : null),
        resolved: post.resolved,
      }
    })

    return {
      name: taskName({
        type: decl.type,
        name: render(decl.nameExpression),
        actions: decl.actions.length > 0 ? decl.actions : defaultActionOf(decl.type),
      }),
      module: mapped.module,
      parameters: mapped.parameters,
      ...(p.condition !== undefined ? { condition: p.condition, when: renderWhen(p.condition) } : null),
      notifyRefs: graph.notifyRefs[i] ?? [],
      postActions,
      keywords: mapped.keywords,
      rawWarnings: [...extractedWarnings, ...graphWarnings, ...own].filter((d) => d.severity === 'warning').map((d) => d.message),
      notifyOnly: mapped.notifyOnly,
      complexity: estimateComplexity({ declaration: decl, condition: p.condition, fallback: mapped.fallback, custom: mapped.custom }),
      source: { file: source, span: decl.span, ref: p.ref },
    }
  })

  const handlers: Handler[] = graph.handlers.map((h) => {
    const run = runOn(h.targetRef, h.action, h.targetIndex, h.span)
    const condition = run.target?.condition
    return {
      name: h.name,
      targetRef: h.targetRef,
      action: h.action,
      module: run.module,
      parameters: run.parameters,
      ...(condition !== undefined ? { condition, when: renderWhen(condition) } : null),
      resolved: h.resolved,
      triggeredBy: h.triggeredBy,
      span: h.span,
    }
  })
  enter('Mapped', { tasks: tasks.length, handlers: handlers.length, edges: graph.edges.length })

  const diagnostics = sortBySourceSpan([...extracted.diagnostics, ...graph.diagnostics, ...stageDiagnostics])
  const complexityCount = (c: ConvertedTask['complexity']): number => tasks.filter((t) => t.complexity === c).length
  const conversion: RecipeConversionV1 = {
    schemaVersion: 1,
    kind: 'RecipeConversion',
    source,
    tasks,
    handlers,
    diagnostics,
    summary: {
      declarationsTotal: extracted.declarations.length,
      tasksTotal: tasks.length,
      handlersTotal: handlers.length,
      errorsTotal: countBySeverity(diagnostics, 'error'),
      warningsTotal: countBySeverity(diagnostics, 'warning'),
      complexity: {
        simple: complexityCount('simple'),
        moderate: complexityCount('moderate'),
        complex: complexityCount('complex'),
      },
    },
  }
  enter('Emitted', { tasks: tasks.length, handlers: handlers.length, diagnostics: diagnostics.length })

  return { conversion, phases }
}
