import { describe, expect, it } from 'vitest'

import { ReasonCodes } from '../../src/Diagnostics.js'
import * as Value from '../../src/Value.js'

const valueOf = (text: string) => Value.normalize(text).value

describe('literal normalizer', () => {
  it('normalizes scalars', () => {
    expect(valueOf("'nginx'")).toEqual(Value.literal('nginx'))
    expect(valueOf(':start')).toEqual(Value.symbol('start'))
    expect(valueOf('8080')).toEqual(Value.literal(8080))
    expect(valueOf('-1')).toEqual(Value.literal(-1))
    expect(valueOf('1_000')).toEqual(Value.literal(1000))
    expect(valueOf('nil')).toEqual(Value.literal(null))
    expect(valueOf('false')).toEqual(Value.literal(false))
  })

  it('keeps integers beyond the safe range as their digits', () => {
    expect(valueOf('12345678901234567890')).toEqual(Value.literal('12345678901234567890'))
    expect(valueOf('-12345678901234567890')).toEqual(Value.literal('-12345678901234567890'))
    expect(valueOf('9007199254740991')).toEqual(Value.literal(9007199254740991))
  })

  it('keeps leading-zero modes as strings', () => {
    expect(valueOf('0644')).toEqual(Value.literal('0644'))
    expect(valueOf("'0644'")).toEqual(Value.literal('0644'))
  })

  it('normalizes arrays, word lists and hashes', () => {
    expect(valueOf("['a', :b, 3]")).toEqual(Value.list([Value.literal('a'), Value.symbol('b'), Value.literal(3)]))
    expect(valueOf('%w(a b)')).toEqual(Value.list([Value.literal('a'), Value.literal('b')]))
    expect(valueOf("{ mode: '0644', 'owner' => 'root' }")).toEqual(
      Value.map([
        { key: 'mode', value: Value.literal('0644') },
        { key: 'owner', value: Value.literal('root') },
      ]),
    )
  })

  it('reads attribute paths in bracket, dotted and precedence-level forms', () => {
    expect(valueOf("node['app']['port']")).toEqual(Value.attributePath('node', ['app', 'port']))
    expect(valueOf('node[:app][:port]')).toEqual(Value.attributePath('node', ['app', 'port']))
    expect(valueOf('node.app.port')).toEqual(Value.attributePath('node', ['app', 'port']))
    expect(valueOf("node.default['app']['port']")).toEqual(Value.attributePath('default', ['app', 'port']))
  })

  it('splits interpolated strings into literal and dynamic segments', () => {
    const value = valueOf('"app --port #{node[\'app\'][\'port\']}"')

    expect(value).toEqual({
      kind: 'Interpolation',
      segments: [Value.literal('app --port '), Value.attributePath('node', ['app', 'port'])],
    })
    expect(Value.render(value)).toBe('app --port {{ app.port }}')
    expect(Value.renderExpression(value)).toBe("'app --port ' ~ app.port")
  })

  it('collapses interpolation of literals into one string', () => {
    const constants = new Map([['VERSION', Value.literal('1.2.3')]])

    expect(Value.normalize('"app-#{VERSION}.tgz"', { constants }).value).toEqual(Value.literal('app-1.2.3.tgz'))
  })

  it('keeps lazy values and unknown constants opaque with a warning', () => {
    const lazy = Value.normalize("lazy { ::File.read('/etc/id') }", { source: 'r.rb' })
    expect(lazy.value).toEqual(Value.opaque("lazy { ::File.read('/etc/id') }"))
    expect(lazy.diagnostics.map((d) => [d.kind, d.code, d.source])).toEqual([
      ['UnrecognizedConstruct', ReasonCodes.valueLazy, 'r.rb'],
    ])

    const constant = Value.normalize('SOME_PATH')
    expect(constant.value).toEqual(Value.opaque('SOME_PATH'))
    expect(constant.diagnostics.map((d) => [d.kind, d.code])).toEqual([['UnresolvedReference', ReasonCodes.valueUnknownConstant]])
  })

  it('reports only the outermost unrecognized expression', () => {
    const out = Value.normalize("node['a'].map { |x| x * 2 }")

    expect(out.value).toEqual(Value.opaque("node['a'].map { |x| x * 2 }"))
    expect(out.diagnostics.map((d) => d.code)).toEqual([ReasonCodes.valueUnrecognized])
    expect(Value.collectOpaque(out.value)).toHaveLength(1)
  })

  it('turns an unterminated string into a structural error', () => {
    const out = Value.normalize("'abc")

    expect(out.value).toEqual(Value.literal('abc'))
    expect(out.diagnostics.map((d) => [d.kind, d.code, d.severity])).toEqual([
      ['StructuralParseError', ReasonCodes.stringUnterminated, 'error'],
    ])
  })
})

describe('task value rendering', () => {
  it('renders attribute variables and keeps structured values structured', () => {
    expect(Value.toTaskValue(Value.attributePath('node', ['app', 'log-dir']))).toBe("{{ app['log-dir'] }}")
    expect(
      Value.toTaskValue(
        Value.map([
          { key: 'port', value: Value.literal(80) },
          { key: 'hosts', value: Value.list([Value.literal('a'), Value.attributePath('node', ['app', 'host'])]) },
        ]),
      ),
    ).toEqual({ port: 80, hosts: ['a', '{{ app.host }}'] })
  })

  it('renders nil as none and escapes quotes in expressions', () => {
    expect(Value.renderExpression(Value.literal(null))).toBe('none')
    expect(Value.renderExpression(Value.literal("it's"))).toBe("'it\\'s'")
  })
})
