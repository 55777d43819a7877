import { Effect } from 'effect'
import { describe, expect, it } from 'vitest'

import * as Convert from '../../src/Convert.js'
import { ReasonCodes } from '../../src/Diagnostics.js'
import * as Guard from '../../src/Guard.js'
import * as Value from '../../src/Value.js'
import { readFixture } from '../helpers/fixtures.js'
import { collectingLogger, silentLoggerLayer } from '../helpers/silentLogger.js'

const run = <A>(program: Effect.Effect<A>): Promise<A> => Effect.runPromise(program.pipe(Effect.provide(silentLoggerLayer)))

const convertText = (text: string) => run(Convert.convertRecipe({ source: 'recipes/default.rb', text }))

describe('convertRecipe', () => {
  it('converts a recipe into tasks and handlers', async () => {
    const out = await run(Convert.convertRecipe(readFixture('cookbook-web/recipes/default.rb')))

    expect(out.schemaVersion).toBe(1)
    expect(out.kind).toBe('RecipeConversion')
    expect(out.source).toBe('cookbook-web/recipes/default.rb')
    expect(
      out.tasks.map((t) => ({ name: t.name, module: t.module, parameters: t.parameters, notifyRefs: t.notifyRefs, complexity: t.complexity })),
    ).toEqual([
      {
        name: 'Install package nginx',
        module: 'ansible.builtin.package',
        parameters: { name: 'nginx', state: 'present' },
        notifyRefs: [],
        complexity: 'simple',
      },
      {
        name: 'Enable and start service nginx',
        module: 'ansible.builtin.service',
        parameters: { name: 'nginx', enabled: true, state: 'started' },
        notifyRefs: [],
        complexity: 'simple',
      },
      {
        name: 'Create template /etc/nginx/nginx.conf',
        module: 'ansible.builtin.template',
        parameters: { dest: '/etc/nginx/nginx.conf', src: 'nginx.conf.erb', owner: 'root', mode: '0644' },
        notifyRefs: ['Reload service nginx'],
        complexity: 'moderate',
      },
    ])
    expect(out.tasks[2]?.source).toMatchObject({ file: 'cookbook-web/recipes/default.rb', ref: 'template[/etc/nginx/nginx.conf]' })
    expect(out.tasks[2]?.source.span.start.line).toBe(7)
    expect(out.tasks[2]?.source.span.end.line).toBe(12)

    expect(out.handlers).toHaveLength(1)
    expect(out.handlers[0]).toMatchObject({
      name: 'Reload service nginx',
      targetRef: 'service[nginx]',
      action: 'reload',
      module: 'ansible.builtin.service',
      parameters: { name: 'nginx', state: 'reloaded' },
      resolved: true,
      triggeredBy: ['template[/etc/nginx/nginx.conf]'],
    })
    expect(out.handlers[0]?.when).toBeUndefined()

    expect(out.diagnostics).toEqual([])
    expect(out.summary).toEqual({
      declarationsTotal: 3,
      tasksTotal: 3,
      handlersTotal: 1,
      errorsTotal: 0,
      warningsTotal: 0,
      complexity: { simple: 2, moderate: 1, complex: 0 },
    })
  })

  it('runs immediate notifications right after the triggering task', async () => {
    const out = await convertText(
      [
        "service 'app' do",
        '  action :nothing',
        'end',
        '',
        "template '/etc/app.conf' do",
        "  source 'app.conf.erb'",
        "  notifies :restart, 'service[app]', :immediately",
        'end',
        '',
      ].join('\n'),
    )

    expect(out.tasks[0]).toMatchObject({ name: 'Declare service app', notifyOnly: true, parameters: { name: 'app' } })
    expect(out.tasks[1]?.notifyRefs).toEqual([])
    expect(out.tasks[1]?.postActions).toEqual([
      {
        targetRef: 'service[app]',
        action: 'restart',
        module: 'ansible.builtin.service',
        parameters: { name: 'app', state: 'restarted' },
        resolved: true,
      },
    ])
    expect(out.handlers).toEqual([])
  })

  it('carries the target condition onto immediate and delayed notifications', async () => {
    const target = ["service 'app' do", '  action :nothing', "  only_if 'test -f /etc/app.enabled'", 'end', '']
    const immediate = await convertText(
      [...target, "template '/etc/app.conf' do", "  notifies :restart, 'service[app]', :immediately", 'end', ''].join('\n'),
    )
    const delayed = await convertText(
      [...target, "template '/etc/app.conf' do", "  notifies :restart, 'service[app]', :delayed", 'end', ''].join('\n'),
    )

    expect(immediate.tasks[1]?.postActions).toEqual([
      {
        targetRef: 'service[app]',
        action: 'restart',
        module: 'ansible.builtin.service',
        parameters: { name: 'app', state: 'restarted' },
        condition: Guard.Test('file_exists', Value.literal('/etc/app.enabled')),
        when: "'/etc/app.enabled' is file",
        resolved: true,
      },
    ])
    expect(delayed.handlers[0]?.when).toBe("'/etc/app.enabled' is file")
  })

  it('keeps a handler for a target declared in another recipe', async () => {
    const out = await convertText(
      ["template '/etc/php.ini' do", "  source 'php.ini.erb'", "  notifies :restart, 'service[php-fpm]'", 'end', ''].join('\n'),
    )

    expect(out.handlers).toMatchObject([
      {
        name: 'Restart service php-fpm',
        module: 'ansible.builtin.service',
        parameters: { name: 'php-fpm', state: 'restarted' },
        resolved: false,
      },
    ])
    expect(out.tasks[0]?.rawWarnings).toEqual([
      "notification target 'service[php-fpm]' is not declared in this recipe; resolve it against the rest of the cookbook",
    ])
    expect(out.summary.warningsTotal).toBe(1)
  })

  it('combines guards into one when expression', async () => {
    const out = await convertText(
      ["package 'curl' do", "  not_if 'which curl'", "  only_if { platform_family?('debian') }", 'end', ''].join('\n'),
    )
    const [task] = out.tasks

    expect(task?.condition).toEqual(
      Guard.And([
        Guard.Not(Guard.Test('command_available', Value.literal('curl'))),
        Guard.Test('platform_family', Value.literal('debian')),
      ]),
    )
    expect(task?.when).toBe(
      "not (lookup('ansible.builtin.pipe', 'command -v ' ~ 'curl' ~ ' || true') | length > 0) and (ansible_facts['os_family'] | lower in ['debian'])",
    )
    expect(task?.complexity).toBe('moderate')
  })

  it('turns trailing if and unless modifiers into when expressions', async () => {
    const out = await convertText(
      ["package 'curl' if platform?('ubuntu')", "service 'nginx' do", '  action :start', "end unless node['skip']", ''].join('\n'),
    )
    const [curl, nginx] = out.tasks

    expect(curl).toMatchObject({ name: 'Install package curl', parameters: { name: 'curl', state: 'present' } })
    expect(curl?.condition).toEqual(Guard.Test('platform', Value.literal('ubuntu')))
    expect(curl?.when).toBe("ansible_facts['distribution'] | lower in ['ubuntu']")
    expect(nginx?.parameters).toEqual({ name: 'nginx', state: 'started' })
    expect(nginx?.condition).toEqual(Guard.Not(Guard.Truthy(Value.attributePath('node', ['skip']))))
    expect(nginx?.when).toBe('not skip | bool')
  })

  it('flags untranslatable guards for manual review', async () => {
    const out = await convertText(
      ["file '/etc/motd' do", "  content 'hello'", "  only_if { File.read('/etc/x').include?('y') }", 'end', ''].join('\n'),
    )
    const [task] = out.tasks

    expect(task?.complexity).toBe('complex')
    expect(task?.when).toBe("File.read('/etc/x').include?('y')")
    expect(out.diagnostics.map((d) => d.code)).toEqual([ReasonCodes.guardManualReview])
    expect(out.diagnostics[0]?.resourceRef).toBe('file[/etc/motd]')
  })

  it('recommends inventory groups for search queries', async () => {
    const out = await convertText(
      ["template '/etc/peers' do", "  source 'peers.erb'", "  variables(peers: search(:node, 'role:web'))", 'end', ''].join('\n'),
    )

    expect(out.tasks[0]?.complexity).toBe('complex')
    expect(out.diagnostics.map((d) => d.code)).toContain(ReasonCodes.mappingSearchQuery)
  })

  it('emits a placeholder task for an unknown resource type', async () => {
    const out = await convertText(["custom_thing 'x' do", '  size 3', 'end', ''].join('\n'))

    expect(out.tasks).toMatchObject([
      {
        name: 'Declare custom_thing x',
        module: 'ansible.builtin.command',
        parameters: { cmd: "echo 'manual conversion required: custom_thing[x]'" },
        keywords: { vars: { size: 3 } },
        complexity: 'complex',
      },
    ])
    expect(out.diagnostics.map((d) => d.code)).toEqual([ReasonCodes.mappingUnrecognizedType])
  })

  it('reports structural errors through the log and the summary', async () => {
    const logs = collectingLogger()
    const out = await Effect.runPromise(
      Convert.convertRecipe({ source: 'recipes/broken.rb', text: "package 'a' do\n  action :install\n" }).pipe(
        Effect.provide(logs.layer),
      ),
    )

    expect(out.summary.errorsTotal).toBe(1)
    expect(out.diagnostics.filter((d) => d.severity === 'error').map((d) => d.code)).toEqual([ReasonCodes.blockUnterminated])
    expect(logs.messages).toEqual(["block.unterminated: block opened with 'do' is never closed with 'end'"])
  })

  it('produces the same output for the same input', async () => {
    const input = readFixture('cookbook-web/recipes/default.rb')
    const first = await run(Convert.convertRecipe(input))
    const second = await run(Convert.convertRecipe(input))

    expect(second).toEqual(first)
  })
})
