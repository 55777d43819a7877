import { Config, Context, Effect, Layer, Option } from 'effect'

export interface ConvertConfigShape {
  /** Collection prefix for tasks generated from custom resources (`<namespace>.<type>`). */
  readonly customModuleNamespace: string
  /** Module used for resource types with no mapping and no definition. */
  readonly fallbackModule: string
  /** When false, attribute paths stay as template variables instead of being replaced by effective values. */
  readonly resolveAttributes: boolean
}

export class ConvertConfigTag extends Context.Tag('@ladle/convert-engine/ConvertConfig')<ConvertConfigTag, ConvertConfigShape>() {}

export const DEFAULT_CONVERT_CONFIG: ConvertConfigShape = {
  customModuleNamespace: 'local.cookbook',
  fallbackModule: 'ansible.builtin.command',
  resolveAttributes: true,
}

const ConvertConfigFromEnv = Config.all({
  customModuleNamespace: Config.string('ladle.convert.custom_module_namespace').pipe(
    Config.withDefault(DEFAULT_CONVERT_CONFIG.customModuleNamespace),
  ),
  fallbackModule: Config.string('ladle.convert.fallback_module').pipe(Config.withDefault(DEFAULT_CONVERT_CONFIG.fallbackModule)),
  resolveAttributes: Config.boolean('ladle.convert.resolve_attributes').pipe(
    Config.withDefault(DEFAULT_CONVERT_CONFIG.resolveAttributes),
  ),
})

export const ConvertConfig = {
  tag: ConvertConfigTag,

  /**
   * Overlays a partial config on top of the current one:
   * - If Env already contains ConvertConfigTag, merge partial on top of it.
   * - Otherwise, use DEFAULT_CONVERT_CONFIG as the base.
   */
  replace(config: Partial<ConvertConfigShape>) {
    return Layer.effect(
      ConvertConfigTag,
      Effect.gen(function* () {
        const current = yield* Effect.serviceOption(ConvertConfigTag)
        const base = Option.isSome(current) ? current.value : DEFAULT_CONVERT_CONFIG
        return {
          ...base,
          ...config,
        }
      }),
    )
  },

  /** The tag when provided, otherwise ConfigProvider values with defaults. An invalid value falls back to the defaults. */
  load: Effect.gen(function* () {
    const override = yield* Effect.serviceOption(ConvertConfigTag)
    if (Option.isSome(override)) {
      return override.value
    }
    return yield* ConvertConfigFromEnv.pipe(
      Effect.catchAll((error) =>
        Effect.logWarning(`invalid ladle.convert configuration, using defaults: ${String(error)}`).pipe(
          Effect.as(DEFAULT_CONVERT_CONFIG),
        ),
      ),
    )
  }),
}
