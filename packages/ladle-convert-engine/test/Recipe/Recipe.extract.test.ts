import { describe, expect, it } from 'vitest'

import { ReasonCodes } from '../../src/Diagnostics.js'
import { extractDeclarations } from '../../src/Recipe.js'
import { literal, list, symbol } from '../../src/Value.js'
import { readFixture } from '../helpers/fixtures.js'

const knownTypes = new Set(['package', 'service', 'template', 'directory'])

describe('block extractor', () => {
  it('extracts resources in file order with actions, properties and notifications', () => {
    const { source, text } = readFixture('cookbook-web/recipes/default.rb')
    const result = extractDeclarations({ source, text, knownTypes })

    expect(result.diagnostics).toEqual([])
    expect(result.declarations.map((d) => d.type)).toEqual(['package', 'service', 'template'])

    const [pkg, service, template] = result.declarations
    expect(pkg?.nameExpression).toEqual(literal('nginx'))
    expect(pkg?.actions).toEqual([])
    expect(service?.actions).toEqual(['enable', 'start'])
    expect(template?.properties.map((p) => [p.name, p.value])).toEqual([
      ['source', literal('nginx.conf.erb')],
      ['owner', literal('root')],
      ['mode', literal('0644')],
    ])
    expect(template?.notifications).toMatchObject([
      { action: 'reload', target: literal('service[nginx]'), timing: 'delayed', declaredTiming: 'delayed', direction: 'notifies' },
    ])
    expect(template?.span.start.line).toBe(7)
    expect(template?.span.end.line).toBe(12)
  })

  it('needs a block or a known type to treat a call as a resource', () => {
    const result = extractDeclarations({ source: 'r.rb', text: "package 'curl'\n" })

    expect(result.declarations).toEqual([])
    expect(result.diagnostics.map((d) => d.code)).toEqual([ReasonCodes.statementUnrecognized])
  })

  it('records enclosing branches, negating earlier ones for else', () => {
    const text = [
      "if platform_family?('debian')",
      "  package 'apt-transport-https'",
      'else',
      "  package 'yum-utils'",
      'end',
      '',
    ].join('\n')
    const [first, second] = extractDeclarations({ source: 'r.rb', text, knownTypes }).declarations

    expect(first?.context).toMatchObject([{ kind: 'test', code: "platform_family?('debian')", negated: false }])
    expect(second?.context).toMatchObject([{ kind: 'test', code: "platform_family?('debian')", negated: true }])
  })

  it('records case branches as matches', () => {
    const text = [
      "case node['platform']",
      "when 'ubuntu', 'debian'",
      "  package 'apt-utils'",
      'end',
      '',
    ].join('\n')
    const [decl] = extractDeclarations({ source: 'r.rb', text, knownTypes }).declarations

    expect(decl?.context).toMatchObject([
      { kind: 'match', subject: "node['platform']", values: ["'ubuntu'", "'debian'"], negated: false },
    ])
  })

  it('marks declarations inside iterator blocks and keeps the loop variable opaque', () => {
    const text = ['%w(git curl).each do |pkg|', '  package pkg', 'end', ''].join('\n')
    const result = extractDeclarations({ source: 'r.rb', text, knownTypes })

    expect(result.declarations).toHaveLength(1)
    expect(result.declarations[0]?.loop).toBe(true)
    expect(result.declarations[0]?.nameExpression).toEqual({ kind: 'Opaque', raw: 'pkg' })
    expect(result.diagnostics.map((d) => d.code)).toEqual([ReasonCodes.valueUnrecognized, ReasonCodes.declarationInLoop])
    expect(result.diagnostics.every((d) => d.resourceRef === 'package[pkg]')).toBe(true)
  })

  it('reads heredoc properties and guard blocks', () => {
    const text = [
      "bash 'build' do",
      '  code <<-EOH',
      '    make',
      '    make install',
      '  EOH',
      "  not_if { ::File.exist?('/usr/local/bin/app') }",
      "  only_if 'test -d /src/app'",
      'end',
      '',
    ].join('\n')
    const [decl] = extractDeclarations({ source: 'r.rb', text }).declarations

    expect(decl?.properties.map((p) => [p.name, p.value])).toEqual([['code', literal('    make\n    make install\n')]])
    expect(decl?.guards.map((g) => [g.kind, g.form])).toEqual([
      [
        'not_if',
        {
          kind: 'Block',
          body: { kind: 'Opaque', raw: "::File.exist?('/usr/local/bin/app')" },
          code: "::File.exist?('/usr/local/bin/app')",
        },
      ],
      ['only_if', { kind: 'Command', command: literal('test -d /src/app') }],
    ])
  })

  it('substitutes constants and local variables declared earlier in the file', () => {
    const text = ["APP_DIR = '/opt/app'", 'directory APP_DIR do', "  owner 'deploy'", 'end', ''].join('\n')
    const result = extractDeclarations({ source: 'r.rb', text })

    expect(result.declarations[0]?.nameExpression).toEqual(literal('/opt/app'))
    expect(result.constants.get('APP_DIR')).toEqual(literal('/opt/app'))
    expect(result.diagnostics).toEqual([])
  })

  it('reads resources() targets, immediate timings and the before timing', () => {
    const text = [
      "template '/etc/app.conf' do",
      "  notifies :restart, resources(service: 'app'), :immediately",
      "  subscribes :create, 'remote_file[/tmp/app.tgz]', :before",
      'end',
      '',
    ].join('\n')
    const result = extractDeclarations({ source: 'r.rb', text })

    expect(result.declarations[0]?.notifications).toMatchObject([
      { action: 'restart', target: literal('service[app]'), timing: 'immediately', direction: 'notifies' },
      { action: 'create', target: literal('remote_file[/tmp/app.tgz]'), timing: 'immediately', declaredTiming: 'before', direction: 'subscribes' },
    ])
    expect(result.diagnostics.map((d) => d.code)).toEqual([ReasonCodes.notifyBeforeTiming])
  })

  it('uses the first branch of a conditional inside a resource body', () => {
    const text = [
      "service 'app' do",
      "  if node['app']['enabled']",
      '    action :start',
      '  else',
      '    action :stop',
      '  end',
      'end',
      '',
    ].join('\n')
    const result = extractDeclarations({ source: 'r.rb', text })

    expect(result.declarations[0]?.actions).toEqual(['start'])
    expect(result.diagnostics.map((d) => d.code)).toEqual([ReasonCodes.declarationConditionalProperty])
  })

  it('keeps list and hash property values structured', () => {
    const text = [
      "user 'deploy' do",
      "  groups ['adm', 'www-data']",
      "  environment 'HOME' => '/home/deploy', 'LANG' => 'C'",
      '  system true',
      'end',
      '',
    ].join('\n')
    const [decl] = extractDeclarations({ source: 'r.rb', text }).declarations

    expect(decl?.properties.map((p) => [p.name, p.value])).toEqual([
      ['groups', list([literal('adm'), literal('www-data')])],
      [
        'environment',
        {
          kind: 'Map',
          entries: [
            { key: 'HOME', value: literal('/home/deploy') },
            { key: 'LANG', value: literal('C') },
          ],
        },
      ],
      ['system', literal(true)],
    ])
  })

  it('declares include_recipe without a block', () => {
    const [decl] = extractDeclarations({ source: 'r.rb', text: "include_recipe 'web::nginx'\n" }).declarations

    expect(decl?.type).toBe('include_recipe')
    expect(decl?.nameExpression).toEqual(literal('web::nginx'))
  })

  it('keeps symbol names as symbols', () => {
    const [decl] = extractDeclarations({ source: 'r.rb', text: 'service :nginx do\n  action :restart\nend\n' }).declarations

    expect(decl?.nameExpression).toEqual(symbol('nginx'))
  })
})

describe('block extractor recovery', () => {
  it('turns trailing if and unless modifiers into enclosing conditions', () => {
    const text = [
      "package 'curl' if platform?('ubuntu')",
      "service 'nginx' do",
      '  action :start',
      "end unless node['skip']",
      "package 'git'",
      '',
    ].join('\n')
    const result = extractDeclarations({ source: 'r.rb', text, knownTypes })
    const [curl, nginx, git] = result.declarations

    expect(result.diagnostics).toEqual([])
    expect(result.declarations.map((d) => [d.type, d.nameExpression])).toEqual([
      ['package', literal('curl')],
      ['service', literal('nginx')],
      ['package', literal('git')],
    ])
    expect(curl?.context).toMatchObject([{ kind: 'test', code: "platform?('ubuntu')", negated: false }])
    expect(nginx?.context).toMatchObject([{ kind: 'test', code: "node['skip']", negated: true }])
    expect(nginx?.actions).toEqual(['start'])
    expect(nginx?.span.end.line).toBe(4)
    expect(git?.context).toEqual([])
  })

  it('keeps a property set under a trailing modifier with a warning', () => {
    const text = ["service 'app' do", "  action :restart if node['app']['live']", 'end', ''].join('\n')
    const result = extractDeclarations({ source: 'r.rb', text, knownTypes })

    expect(result.declarations[0]?.actions).toEqual(['restart'])
    expect(result.declarations[0]?.context).toEqual([])
    expect(result.diagnostics.map((d) => d.code)).toEqual([ReasonCodes.declarationConditionalProperty])
  })

  it('never lifts resources nested in code blocks to the top level', () => {
    const text = [
      "ruby_block 'rewrite' do",
      '  block do',
      "    file '/tmp/marker' do",
      "      content 'x'",
      '    end',
      '  end',
      'end',
      "package 'tree'",
      "package 'tree'",
      '',
    ].join('\n')
    const result = extractDeclarations({ source: 'r.rb', text, knownTypes })

    expect(result.declarations.map((d) => [d.type, d.span.start.line])).toEqual([
      ['ruby_block', 1],
      ['package', 8],
      ['package', 9],
    ])
    expect(result.declarations[1]?.nameExpression).toEqual(literal('tree'))
    expect(result.declarations[2]?.nameExpression).toEqual(literal('tree'))
  })

  it('reports an unclosed block at its opener and resumes at the next statement', () => {
    const text = [
      "service 'broken' do",
      '  action :start',
      '',
      "template '/etc/app.conf' do",
      "  source 'app.erb'",
      'end',
      '',
    ].join('\n')
    const result = extractDeclarations({ source: 'r.rb', text })

    expect(result.declarations.map((d) => [d.type, d.malformed])).toEqual([
      ['service', true],
      ['template', false],
    ])
    expect(result.declarations[0]?.actions).toEqual(['start'])
    expect(result.declarations[1]?.properties.map((p) => p.name)).toEqual(['source'])
    expect(result.diagnostics).toHaveLength(1)
    expect(result.diagnostics[0]).toMatchObject({
      kind: 'StructuralParseError',
      code: ReasonCodes.blockUnterminated,
      severity: 'error',
      span: { start: { line: 1, column: 18 } },
    })
  })

  it('reports a stray end and keeps going', () => {
    const text = ['end', "directory '/srv' do", "  mode '0755'", 'end', ''].join('\n')
    const result = extractDeclarations({ source: 'r.rb', text })

    expect(result.declarations.map((d) => d.type)).toEqual(['directory'])
    expect(result.diagnostics.map((d) => [d.code, d.severity])).toEqual([[ReasonCodes.blockUnexpectedEnd, 'error']])
  })
})
