import { makeDiagnostic, type Diagnostic } from '../diagnostics.js'
import type { Property, ResourceDeclaration } from '../extract/model.js'
import { formatResourceRef } from '../notify/targetRef.js'
import { ReasonCodes, type ReasonCode } from '../reasonCodes.js'
import { namePropertyOf, type ResourceDefinition } from '../schema/model.js'
import { satisfiesConstraint } from '../schema/typeConstraint.js'
import { literalString, type TaskValue } from '../value/model.js'
import { render, toTaskValue } from '../value/render.js'
import type { TaskKeywords, TaskParameters } from './model.js'
import type { ResourceMapping, ResourceTableEntries } from './resourceTable.js'

export type MappingContext = {
  readonly source: string
  readonly table: ResourceTableEntries
  /** Custom resource definitions by type name. */
  readonly definitions: ReadonlyMap<string, ResourceDefinition>
  readonly customModuleNamespace: string
  readonly fallbackModule: string
}

export type MappedResource = {
  readonly module: string
  readonly parameters: TaskParameters
  readonly keywords: TaskKeywords
  /** Every effective action is `:nothing`. */
  readonly notifyOnly: boolean
  /** Custom resource with a definition. */
  readonly custom: boolean
  /** Unknown type mapped to the fallback module. */
  readonly fallback: boolean
  readonly diagnostics: ReadonlyArray<Diagnostic>
}

/** Properties that become task keywords for every resource type. */
const COMMON_KEYWORDS: { readonly [property: string]: string } = {
  ignore_failure: 'ignore_errors',
  sensitive: 'no_log',
  retries: 'retries',
  retry_delay: 'delay',
}

const COMMAND_KEYWORDS: { readonly [property: string]: string } = {
  environment: 'environment',
  user: 'become_user',
}

const TYPE_KEYWORDS: { readonly [type: string]: { readonly [property: string]: string } } = {
  execute: COMMAND_KEYWORDS,
  bash: COMMAND_KEYWORDS,
  script: COMMAND_KEYWORDS,
  template: { variables: 'vars' },
}

const keywordFor = (type: string, property: string): string | undefined =>
  TYPE_KEYWORDS[type]?.[property] ?? COMMON_KEYWORDS[property]

/**
 * Maps one (attribute-resolved) declaration to a module and its parameters. `actions` overrides the declared
 * actions, which is how handlers and post-actions run a notified action against the target's declaration.
 */
export const mapResource = (
  ctx: MappingContext,
  decl: ResourceDeclaration,
  actions: ReadonlyArray<string> = decl.actions,
): MappedResource => {
  const ref = formatResourceRef(decl.type, decl.nameExpression)
  const diagnostics: Diagnostic[] = []
  const warn = (kind: 'UnrecognizedConstruct' | 'SchemaViolation', code: ReasonCode, message: string, property?: Property): void => {
    diagnostics.push(
      makeDiagnostic({ kind, code, message, source: ctx.source, span: property?.span ?? decl.span, resourceRef: ref }),
    )
  }

  const keywords: { [keyword: string]: TaskValue } = {}
  const rest: Property[] = []
  for (const property of decl.properties) {
    const keyword = keywordFor(decl.type, property.name)
    if (keyword === undefined) {
      rest.push(property)
      continue
    }
    keywords[keyword] = toTaskValue(property.value)
    if (keyword === 'become_user') keywords['become'] = true
  }

  const mapping = ctx.table[decl.type]
  if (mapping !== undefined) {
    const mapped = mapBuiltin(mapping, decl, actions, rest, warn)
    return { ...mapped, keywords, custom: false, fallback: false, diagnostics }
  }

  const definition = ctx.definitions.get(decl.type)
  if (definition !== undefined) {
    const mapped = mapCustom(ctx, definition, decl, actions, rest, keywords, warn)
    return { ...mapped, keywords, custom: true, fallback: false, diagnostics }
  }

  warn(
    'UnrecognizedConstruct',
    ReasonCodes.mappingUnrecognizedType,
    `resource type '${decl.type}' has no module mapping and no resource definition; emitted as a ${ctx.fallbackModule} placeholder`,
  )
  if (rest.length > 0) keywords['vars'] = Object.fromEntries(rest.map((p) => [p.name, toTaskValue(p.value)]))
  return {
    module: ctx.fallbackModule,
    parameters: { cmd: `echo 'manual conversion required: ${ref}'` },
    keywords,
    notifyOnly: actions.length > 0 && actions.every((a) => a === 'nothing'),
    custom: false,
    fallback: true,
    diagnostics,
  }
}

type Warn = (kind: 'UnrecognizedConstruct' | 'SchemaViolation', code: ReasonCode, message: string, property?: Property) => void

/** `include_recipe 'cookbook::recipe'` → `include_role name=cookbook tasks_from=recipe`. */
const includeParameters = (decl: ResourceDeclaration): TaskParameters => {
  const name = literalString(decl.nameExpression)
  if (name === undefined) return { name: render(decl.nameExpression) }
  const [cookbook = name, recipe] = name.split('::')
  return recipe !== undefined && recipe !== 'default' ? { name: cookbook, tasks_from: recipe } : { name: cookbook }
}

const mapBuiltin = (
  mapping: ResourceMapping,
  decl: ResourceDeclaration,
  declared: ReadonlyArray<string>,
  properties: ReadonlyArray<Property>,
  warn: Warn,
): { readonly module: string; readonly parameters: TaskParameters; readonly notifyOnly: boolean } => {
  const actions = declared.length > 0 ? declared : [mapping.defaultAction]
  let module = mapping.module
  let nameParam = mapping.nameParam
  const effects: Array<TaskParameters> = []
  for (const action of actions) {
    const effect = mapping.actions[action]
    if (effect === undefined) {
      warn('UnrecognizedConstruct', ReasonCodes.mappingUnsupportedAction, `action '${action}' of '${decl.type}' has no ${mapping.module} equivalent; skipped`)
      continue
    }
    if (effect.module !== undefined) module = effect.module
    if (effect.nameParam !== undefined) nameParam = effect.nameParam
    effects.push(effect.params)
  }

  const parameters: { [param: string]: TaskValue } =
    decl.type === 'include_recipe'
      ? { ...includeParameters(decl) }
      : nameParam !== undefined
        ? { [nameParam]: toTaskValue(decl.nameExpression) }
        : {}
  for (const params of effects) Object.assign(parameters, params)

  for (const property of properties) {
    const param = mapping.properties[property.name]
    if (param === undefined) {
      warn(
        'UnrecognizedConstruct',
        ReasonCodes.mappingDroppedProperty,
        `property '${property.name}' of '${decl.type}' has no ${module} parameter; dropped`,
        property,
      )
      continue
    }
    parameters[param] = toTaskValue(property.value)
  }

  return { module, parameters, notifyOnly: actions.every((a) => a === 'nothing') }
}

const mapCustom = (
  ctx: MappingContext,
  definition: ResourceDefinition,
  decl: ResourceDeclaration,
  declared: ReadonlyArray<string>,
  properties: ReadonlyArray<Property>,
  keywords: { [keyword: string]: TaskValue },
  warn: Warn,
): { readonly module: string; readonly parameters: TaskParameters; readonly notifyOnly: boolean } => {
  const nameProperty = namePropertyOf(definition.properties)
  const parameters: { [param: string]: TaskValue } = { [nameProperty]: toTaskValue(decl.nameExpression) }

  for (const action of declared) {
    if (action !== 'nothing' && !definition.actions.includes(action)) {
      warn('SchemaViolation', ReasonCodes.schemaUnknownAction, `'${decl.type}' defines no action '${action}'`)
    }
  }
  const [onlyAction] = declared
  if (onlyAction !== undefined && declared.length === 1) parameters['state'] = onlyAction
  else if (declared.length > 1) parameters['state'] = [...declared]

  for (const property of properties) {
    const schema = definition.properties.find((p) => p.name === property.name)
    if (schema === undefined) {
      warn('SchemaViolation', ReasonCodes.schemaUnknownProperty, `'${decl.type}' declares no property '${property.name}'; passed through`, property)
    } else {
      if (schema.typeConstraint !== undefined && satisfiesConstraint(schema.typeConstraint, property.value) === false) {
        warn(
          'SchemaViolation',
          ReasonCodes.schemaTypeMismatch,
          `property '${property.name}' of '${decl.type}' expects ${schema.typeConstraint}; passed through unchanged`,
          property,
        )
      }
      if (schema.sensitive) keywords['no_log'] = true
    }
    parameters[property.name] = toTaskValue(property.value)
  }

  const provided = new Set([nameProperty, ...properties.map((p) => p.name)])
  for (const schema of definition.properties) {
    if (provided.has(schema.name)) continue
    if (schema.required) {
      warn('SchemaViolation', ReasonCodes.schemaMissingRequired, `required property '${schema.name}' of '${decl.type}' is not set`)
    } else if (schema.default !== undefined) {
      parameters[schema.name] = toTaskValue(schema.default)
    }
  }

  return {
    module: `${ctx.customModuleNamespace}.${decl.type}`,
    parameters,
    notifyOnly: declared.length > 0 && declared.every((a) => a === 'nothing'),
  }
}
