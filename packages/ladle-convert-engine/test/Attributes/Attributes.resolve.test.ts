import { describe, expect, it } from 'vitest'

import * as Attributes from '../../src/Attributes.js'
import type { AttributeAssignment, Precedence } from '../../src/Attributes.js'
import { ReasonCodes } from '../../src/Diagnostics.js'
import * as Value from '../../src/Value.js'
import { readFixture } from '../helpers/fixtures.js'

const assign = (precedence: Precedence, keyPath: ReadonlyArray<string>, value: Value.ValueExpr): AttributeAssignment => ({
  precedence,
  keyPath,
  value,
})

describe('attribute precedence resolver', () => {
  it('picks the highest precedence regardless of declaration order', () => {
    const effective = Attributes.resolve([
      assign('automatic', ['platform'], Value.literal('ubuntu')),
      assign('default', ['platform'], Value.literal('debian')),
      assign('override', ['platform'], Value.literal('centos')),
      assign('normal', ['platform'], Value.literal('fedora')),
    ])

    expect(effective).toEqual([{ keyPath: ['platform'], value: Value.literal('ubuntu'), winningPrecedence: 'automatic' }])
  })

  it('ranks force_default above normal and force_override below automatic', () => {
    const [forced] = Attributes.resolve([
      assign('force_default', ['a'], Value.literal(1)),
      assign('normal', ['a'], Value.literal(2)),
    ])
    const [auto] = Attributes.resolve([
      assign('automatic', ['b'], Value.literal(1)),
      assign('force_override', ['b'], Value.literal(2)),
    ])

    const [overridden] = Attributes.resolve([
      assign('override', ['c'], Value.literal(1)),
      assign('force_default', ['c'], Value.literal(2)),
    ])

    expect(forced?.winningPrecedence).toBe('force_default')
    expect(auto?.winningPrecedence).toBe('automatic')
    expect(overridden?.winningPrecedence).toBe('override')
  })

  it('breaks ties at the same level by the last declaration', () => {
    const [winner] = Attributes.resolve([
      assign('default', ['app', 'port'], Value.literal(80)),
      assign('default', ['app', 'port'], Value.literal(8080)),
    ])

    expect(winner?.value).toEqual(Value.literal(8080))
  })

  it('orders ties by the explicit index when one is given', () => {
    const [winner] = Attributes.resolve([
      { ...assign('default', ['a'], Value.literal('later')), index: 5 },
      { ...assign('default', ['a'], Value.literal('earlier')), index: 1 },
    ])

    expect(winner?.value).toEqual(Value.literal('later'))
  })

  it('merges partial paths into hash values declared at a parent path', () => {
    const effective = Attributes.resolve([
      assign(
        'default',
        ['app'],
        Value.map([
          { key: 'port', value: Value.literal(80) },
          { key: 'user', value: Value.literal('www') },
        ]),
      ),
      assign('override', ['app', 'port'], Value.literal(443)),
    ])

    expect(effective.map((e) => [e.keyPath, e.value, e.winningPrecedence])).toEqual([
      [['app', 'port'], Value.literal(443), 'override'],
      [['app', 'user'], Value.literal('www'), 'default'],
    ])
  })

  it('resolves a path declared only at automatic level', () => {
    expect(Attributes.resolve([assign('automatic', ['fqdn'], Value.literal('web1.example.test'))])).toEqual([
      { keyPath: ['fqdn'], value: Value.literal('web1.example.test'), winningPrecedence: 'automatic' },
    ])
  })
})

describe('attribute files', () => {
  it('parses assignments at every precedence level in declaration order', () => {
    const { source, text } = readFixture('cookbook-web/attributes/default.rb')
    const parsed = Attributes.parseAttributeFile({ source, text })

    expect(parsed.diagnostics).toEqual([])
    expect(parsed.assignments.map((a) => [a.precedence, a.keyPath, a.value, a.index])).toEqual([
      ['default', ['app', 'port'], Value.literal(3000), 0],
      ['default', ['app', 'dir'], Value.literal('/opt/app'), 1],
      ['normal', ['app', 'port'], Value.literal(8080), 2],
      ['force_override', ['app', 'port'], Value.literal(443), 3],
    ])

    const [port] = Attributes.resolve(parsed.assignments)
    expect(port).toMatchObject({ keyPath: ['app', 'port'], value: Value.literal(443), winningPrecedence: 'force_override' })
    expect(port?.source).toBe('cookbook-web/attributes/default.rb')
    expect(port?.span?.start.line).toBe(4)
  })

  it('reads node.<level> writes, set and the _unless forms', () => {
    const text = [
      "node.override['app']['workers'] = 4",
      "set['app']['name'] = 'shop'",
      "default_unless['app']['name'] = 'ignored'",
      "default['app']['name'] = 'shop-default'",
      "default_unless['app']['name'] = 'also-ignored'",
      '',
    ].join('\n')
    const parsed = Attributes.parseAttributeFile({ source: 'a.rb', text, startIndex: 10 })

    expect(parsed.assignments.map((a) => [a.precedence, a.keyPath.join('.'), a.value, a.index])).toEqual([
      ['override', 'app.workers', Value.literal(4), 10],
      ['normal', 'app.name', Value.literal('shop'), 11],
      ['default', 'app.name', Value.literal('ignored'), 12],
      ['default', 'app.name', Value.literal('shop-default'), 13],
    ])
  })

  it('skips an _unless write under a hash already set at a parent path', () => {
    const text = ["default['app'] = {'port' => 1}", "default_unless['app']['port'] = 2", ''].join('\n')
    const parsed = Attributes.parseAttributeFile({ source: 'a.rb', text })

    expect(parsed.assignments.map((a) => a.keyPath.join('.'))).toEqual(['app'])
    expect(Attributes.resolve(parsed.assignments).map((e) => [e.keyPath, e.value])).toEqual([[['app', 'port'], Value.literal(1)]])
  })

  it('skips an _unless write when a child path is already set', () => {
    const text = ["default['app']['port'] = 1", "default_unless['app'] = {'port' => 2}", ''].join('\n')
    const parsed = Attributes.parseAttributeFile({ source: 'a.rb', text })

    expect(parsed.assignments.map((a) => [a.keyPath.join('.'), a.value])).toEqual([['app.port', Value.literal(1)]])
  })

  it('shares assigned paths between files', () => {
    const assigned: Attributes.AssignedPaths = new Set()
    const first = Attributes.parseAttributeFile({ source: 'attributes/a.rb', text: "default['app']['port'] = 1\n", assigned })
    const second = Attributes.parseAttributeFile({
      source: 'attributes/b.rb',
      text: "default_unless['app']['port'] = 2\n",
      assigned,
      startIndex: first.assignments.length,
    })

    expect(second.assignments).toEqual([])
    expect(Attributes.resolve([...first.assignments, ...second.assignments]).map((e) => e.value)).toEqual([Value.literal(1)])
  })

  it('marks assignments under a trailing modifier as conditional', () => {
    const text = ["default['app']['ssl'] = true if node['platform'] == 'ubuntu'", "default['app']['tls'] = false", ''].join('\n')
    const parsed = Attributes.parseAttributeFile({ source: 'a.rb', text })

    expect(parsed.assignments.map((a) => [a.keyPath.join('.'), a.value, a.conditional])).toEqual([
      ['app.ssl', Value.literal(true), true],
      ['app.tls', Value.literal(false), undefined],
    ])
    expect(parsed.diagnostics.map((d) => d.code)).toEqual([ReasonCodes.attributeConditional])
  })

  it('substitutes locals and keeps conditional assignments with a warning', () => {
    const text = [
      "base = '/srv'",
      'default[\'app\'][\'root\'] = "#{base}/app"',
      "if node['platform'] == 'ubuntu'",
      "  default['app']['user'] = 'www-data'",
      'end',
      "include_attribute 'web::other'",
      '',
    ].join('\n')
    const parsed = Attributes.parseAttributeFile({ source: 'a.rb', text })

    expect(parsed.assignments.map((a) => [a.keyPath.join('.'), a.value, a.conditional])).toEqual([
      ['app.root', Value.literal('/srv/app'), undefined],
      ['app.user', Value.literal('www-data'), true],
    ])
    expect(parsed.diagnostics.map((d) => d.code)).toEqual([
      ReasonCodes.attributeConditional,
      ReasonCodes.attributeUnsupportedStatement,
    ])
  })
})

describe('attribute table', () => {
  const table = Attributes.makeTable(
    Attributes.resolve([
      assign('default', ['app', 'user'], Value.literal('deploy')),
      assign('default', ['app', 'port'], Value.literal(3000)),
      assign(
        'default',
        ['app', 'log_dir'],
        Value.interpolation([Value.literal('/var/log/'), Value.attributePath('node', ['app', 'user'])]),
      ),
      assign('default', ['loop', 'a'], Value.attributePath('node', ['loop', 'b'])),
      assign('default', ['loop', 'b'], Value.attributePath('node', ['loop', 'a'])),
    ]),
  )

  it('follows references between attributes', () => {
    const out = Attributes.resolveValue(table, Value.attributePath('node', ['app', 'log_dir']))

    expect(out).toEqual({ value: Value.literal('/var/log/deploy'), unresolved: [], cycles: [] })
  })

  it('builds a hash for a parent path', () => {
    expect(table.get(['app'])).toEqual(
      Value.map([
        { key: 'user', value: Value.literal('deploy') },
        { key: 'port', value: Value.literal(3000) },
        {
          key: 'log_dir',
          value: Value.interpolation([Value.literal('/var/log/'), Value.attributePath('node', ['app', 'user'])]),
        },
      ]),
    )
  })

  it('keeps missing paths and cycles as variables', () => {
    const missing = Attributes.resolveValue(table, Value.attributePath('node', ['app', 'missing']))
    expect(missing.value).toEqual(Value.attributePath('node', ['app', 'missing']))
    expect(missing.unresolved).toEqual([['app', 'missing']])

    const cyclic = Attributes.resolveValue(table, Value.attributePath('node', ['loop', 'a']))
    expect(cyclic.value).toEqual(Value.attributePath('node', ['loop', 'a']))
    expect(cyclic.cycles).toEqual([['loop', 'a']])
  })

  it('leaves new_resource references alone', () => {
    const value = Value.attributePath('new_resource', ['port'])

    expect(Attributes.resolveValue(table, value)).toEqual({ value, unresolved: [], cycles: [] })
  })
})
