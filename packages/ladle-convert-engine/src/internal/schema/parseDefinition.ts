import { makeDiagnostic, type Diagnostic } from '../diagnostics.js'
import { isIdent, type Token } from '../lexer/tokens.js'
import { ReasonCodes } from '../reasonCodes.js'
import { spanAtOffset, spanOfRange } from '../span.js'
import { readCall, type Argument, type KeywordArgument } from '../syntax/arguments.js'
import { parseProgram, sourceOf, type CommandStatement, type Statement } from '../syntax/statements.js'
import { literalString, type ValueExpr } from '../value/model.js'
import { normalizeTokens, type NormalizeContext } from '../value/normalize.js'
import type { PropertySchema, ResourceDefinition } from './model.js'

export type ParseDefinitionArgs = {
  readonly text: string
  readonly source?: string
  /** Type names derived from the file location (`<cookbook>_<file>`), used alongside `resource_name`/`provides`. */
  readonly typeNames?: ReadonlyArray<string>
}

const NAME_FLAGS: ReadonlySet<string> = new Set(['name_property', 'name_attribute'])

export const parseResourceDefinition = (args: ParseDefinitionArgs): ResourceDefinition => {
  const source = args.source ?? ''
  const { text } = args
  const program = parseProgram(text)
  const { lines } = program
  const ctx: NormalizeContext = { source, text, lines, constants: new Map() }
  const diagnostics: Diagnostic[] = program.problems.map((p) =>
    makeDiagnostic({ kind: 'StructuralParseError', code: p.code, message: p.message, source, span: spanAtOffset(lines, p.offset) }),
  )
  const properties: PropertySchema[] = []
  const actions: string[] = []
  const typeNames: string[] = []
  let defaultAction: string | undefined

  const violation = (code: typeof ReasonCodes.schemaDuplicateNameProperty | typeof ReasonCodes.schemaMalformedDeclaration, message: string, stmt: CommandStatement): void => {
    diagnostics.push(makeDiagnostic({ kind: 'SchemaViolation', code, message, source, span: spanOfRange(lines, stmt.start, stmt.end) }))
  }

  const normalize = (tokens: ReadonlyArray<Token>): ValueExpr => {
    const out = normalizeTokens(ctx, tokens)
    diagnostics.push(...out.diagnostics)
    return out.value
  }

  /** Symbols from `:a, :b` or `[:a, :b]`. */
  const symbolList = (args: ReadonlyArray<Argument>): ReadonlyArray<string> =>
    args.flatMap((arg) => {
      if (arg.kind !== 'positional') return []
      const value = normalize(arg.tokens)
      if (value.kind === 'List') return value.items.flatMap((item) => literalString(item) ?? [])
      return literalString(value) ?? []
    })

  const addAction = (name: string): void => {
    if (!actions.includes(name)) actions.push(name)
  }

  const isTrue = (arg: KeywordArgument | undefined): boolean => {
    if (arg === undefined) return false
    const value = normalize(arg.tokens)
    // `required: [:create]` limits the requirement to some actions; still required for those
    return (value.kind === 'Literal' && value.value === true) || value.kind === 'List'
  }

  const readProperty = (stmt: CommandStatement, legacy: boolean): void => {
    const call = readCall(stmt.tokens)
    const positional = call?.args.filter((a) => a.kind === 'positional') ?? []
    const keywords = call?.args.flatMap((a) => (a.kind === 'keyword' ? [a] : [])) ?? []
    const [nameArg, typeArg] = positional
    const name = nameArg !== undefined ? literalString(normalize(nameArg.tokens)) : undefined
    if (name === undefined) {
      violation(ReasonCodes.schemaMalformedDeclaration, `'${sourceOf(text, stmt.tokens)}' does not name a property`, stmt)
      return
    }
    const keyword = (key: string): KeywordArgument | undefined => keywords.find((k) => k.key === key)

    const kindOf = keyword('kind_of')
    const typeTokens = !legacy && typeArg !== undefined ? typeArg.tokens : kindOf?.tokens
    const defaultArg = keyword('default')
    const wantsName = keywords.some((k) => NAME_FLAGS.has(k.key) && isTrue(k))

    let isNameProperty = wantsName
    if (wantsName && properties.some((p) => p.isNameProperty)) {
      isNameProperty = false
      violation(ReasonCodes.schemaDuplicateNameProperty, `'${name}' is a second name property; the first one is kept`, stmt)
    }

    properties.push({
      name,
      ...(typeTokens !== undefined && typeTokens.length > 0 ? { typeConstraint: sourceOf(text, typeTokens) } : null),
      isNameProperty,
      ...(defaultArg !== undefined ? { default: normalize(defaultArg.tokens) } : null),
      required: isTrue(keyword('required')),
      sensitive: isTrue(keyword('sensitive')),
    })
  }

  const walk = (statements: ReadonlyArray<Statement>): void => {
    for (const stmt of statements) {
      if (stmt.kind === 'compound') {
        if (stmt.keyword === 'class' || stmt.keyword === 'module') walk(stmt.body)
        continue
      }
      if (stmt.kind !== 'command') continue
      const head = stmt.tokens[0]
      if (!isIdent(head)) continue
      const call = readCall(stmt.tokens)
      switch (head.value) {
        case 'property':
          readProperty(stmt, false)
          break
        case 'attribute':
          readProperty(stmt, true)
          break
        case 'actions':
          symbolList(call?.args ?? []).forEach(addAction)
          break
        case 'action': {
          const [name] = symbolList(call?.args ?? [])
          if (name !== undefined && stmt.block !== undefined) addAction(name)
          break
        }
        case 'default_action': {
          const [name] = symbolList(call?.args ?? [])
          if (name !== undefined) {
            defaultAction ??= name
            addAction(name)
          }
          break
        }
        case 'resource_name':
        case 'provides': {
          const [name] = symbolList(call?.args ?? [])
          if (name !== undefined && !typeNames.includes(name)) typeNames.push(name)
          break
        }
      }
    }
  }

  walk(program.statements)
  for (const name of args.typeNames ?? []) {
    if (!typeNames.includes(name)) typeNames.push(name)
  }
  const effectiveDefault = defaultAction ?? actions[0]

  return {
    typeNames,
    properties,
    actions,
    ...(effectiveDefault !== undefined ? { defaultAction: effectiveDefault } : null),
    diagnostics,
  }
}

/** Property schemas of a custom or legacy resource file. */
export const parseSchema = (text: string): ReadonlyArray<PropertySchema> => parseResourceDefinition({ text }).properties
