import { ConfigProvider, Effect, Layer } from 'effect'
import { describe, expect, it } from 'vitest'

import { ConvertConfig, DEFAULT_CONVERT_CONFIG } from '../../src/Config.js'
import * as Convert from '../../src/Convert.js'
import * as ResourceTable from '../../src/ResourceTable.js'
import { readFixture } from '../helpers/fixtures.js'
import { collectingLogger, silentLoggerLayer } from '../helpers/silentLogger.js'

const cookbook: Convert.ConvertCookbookArgs = {
  cookbookName: 'web',
  recipes: [readFixture('cookbook-web/recipes/app.rb')],
  attributeFiles: [readFixture('cookbook-web/attributes/default.rb')],
  resourceFiles: [readFixture('cookbook-web/resources/site.rb')],
}

describe('ConvertConfig', () => {
  it('uses the defaults when nothing is configured', async () => {
    const config = await Effect.runPromise(ConvertConfig.load.pipe(Effect.provide(silentLoggerLayer)))

    expect(config).toEqual(DEFAULT_CONVERT_CONFIG)
  })

  it('reads values from the config provider', async () => {
    const provider = ConfigProvider.fromMap(
      new Map([
        ['ladle.convert.fallback_module', 'ansible.builtin.shell'],
        ['ladle.convert.resolve_attributes', 'false'],
      ]),
    )
    const config = await Effect.runPromise(ConvertConfig.load.pipe(Effect.withConfigProvider(provider)))

    expect(config).toEqual({ customModuleNamespace: 'local.cookbook', fallbackModule: 'ansible.builtin.shell', resolveAttributes: false })
  })

  it('falls back to the defaults with a warning on an invalid value', async () => {
    const logs = collectingLogger()
    const provider = ConfigProvider.fromMap(new Map([['ladle.convert.resolve_attributes', 'maybe']]))
    const config = await Effect.runPromise(
      ConvertConfig.load.pipe(Effect.withConfigProvider(provider), Effect.provide(logs.layer)),
    )

    expect(config).toEqual(DEFAULT_CONVERT_CONFIG)
    expect(logs.messages).toHaveLength(1)
    expect(logs.messages[0]?.startsWith('invalid ladle.convert configuration, using defaults: ')).toBe(true)
  })

  it('overlays replacements on top of the provided config', async () => {
    const layer = ConvertConfig.replace({ fallbackModule: 'ansible.builtin.shell' }).pipe(
      Layer.provide(ConvertConfig.replace({ customModuleNamespace: 'acme.site' })),
    )
    const config = await Effect.runPromise(ConvertConfig.load.pipe(Effect.provide(layer)))

    expect(config).toEqual({ customModuleNamespace: 'acme.site', fallbackModule: 'ansible.builtin.shell', resolveAttributes: true })
  })

  it('applies the module namespace to custom resources', async () => {
    const out = await Effect.runPromise(
      Convert.convertCookbook(cookbook).pipe(
        Effect.provide(Layer.mergeAll(silentLoggerLayer, ConvertConfig.replace({ customModuleNamespace: 'acme.site' }))),
      ),
    )

    expect(out.recipes[0]?.tasks[1]?.module).toBe('acme.site.web_site')
  })

  it('keeps attribute paths as variables when resolution is off', async () => {
    const out = await Effect.runPromise(
      Convert.convertCookbook(cookbook).pipe(
        Effect.provide(Layer.mergeAll(silentLoggerLayer, ConvertConfig.replace({ resolveAttributes: false }))),
      ),
    )

    expect(out.recipes[0]?.tasks[0]?.parameters).toEqual({ cmd: 'app --port {{ app.port }}', chdir: '{{ app.dir }}' })
  })
})

describe('ResourceTable', () => {
  it('loads the built-in table by default', async () => {
    const entries = await Effect.runPromise(ResourceTable.load)

    expect(entries).toBe(ResourceTable.defaults)
  })

  it('adds resource types through a layer', async () => {
    const layer = ResourceTable.extend({
      firewall_rule: {
        module: 'community.general.ufw',
        defaultAction: 'allow',
        actions: { allow: { params: { rule: 'allow' } } },
        properties: { port: 'port' },
      },
    })
    const out = await Effect.runPromise(
      Convert.convertRecipe({ source: 'recipes/firewall.rb', text: "firewall_rule 'http' do\n  port 80\n  action :allow\nend\n" }).pipe(
        Effect.provide(Layer.mergeAll(silentLoggerLayer, layer)),
      ),
    )

    expect(out.tasks).toMatchObject([
      { name: 'Allow firewall_rule http', module: 'community.general.ufw', parameters: { rule: 'allow', port: 80 } },
    ])
    expect(out.tasks[0]?.parameters).toEqual({ rule: 'allow', port: 80 })
    expect(out.diagnostics).toEqual([])
  })
})
