import { describe, expect, it } from 'vitest'

import { ReasonCodes } from '../../src/Diagnostics.js'
import * as Notifications from '../../src/Notifications.js'
import type { GraphNode } from '../../src/Notifications.js'
import { span } from '../helpers/declarations.js'

type Edge = GraphNode['notifications'][number]

const notifies = (action: string, targetRef: string, timing: Edge['timing'] = 'delayed'): Edge => ({
  action,
  targetRef,
  timing,
  direction: 'notifies',
  span,
})

const subscribes = (action: string, targetRef: string, timing: Edge['timing'] = 'delayed'): Edge => ({
  action,
  targetRef,
  timing,
  direction: 'subscribes',
  span,
})

describe('notification graph builder', () => {
  it('collapses delayed notifications of the same target and action into one handler', () => {
    const graph = Notifications.buildGraph({
      source: 'r.rb',
      nodes: [
        { ref: 'service[app]', notifications: [] },
        { ref: 'template[/etc/app/a.conf]', notifications: [notifies('restart', 'service[app]')] },
        { ref: 'template[/etc/app/b.conf]', notifications: [notifies('restart', 'service[app]')] },
      ],
    })

    expect(graph.handlers).toEqual([
      {
        name: 'Restart service app',
        targetRef: 'service[app]',
        action: 'restart',
        targetIndex: 0,
        resolved: true,
        triggeredBy: ['template[/etc/app/a.conf]', 'template[/etc/app/b.conf]'],
        span,
      },
    ])
    expect(graph.notifyRefs).toEqual([[], ['Restart service app'], ['Restart service app']])
    expect(graph.postActions).toEqual([[], [], []])
    expect(graph.diagnostics).toEqual([])
  })

  it('keeps a separate handler per action', () => {
    const graph = Notifications.buildGraph({
      source: 'r.rb',
      nodes: [
        { ref: 'service[app]', notifications: [] },
        {
          ref: 'template[/etc/app.conf]',
          notifications: [notifies('reload', 'service[app]'), notifies('restart', 'service[app]')],
        },
      ],
    })

    expect(graph.handlers.map((h) => h.name)).toEqual(['Reload service app', 'Restart service app'])
    expect(graph.notifyRefs[1]).toEqual(['Reload service app', 'Restart service app'])
  })

  it('attaches immediate notifications to the triggering node without collapsing them', () => {
    const graph = Notifications.buildGraph({
      source: 'r.rb',
      nodes: [
        { ref: 'execute[migrate]', notifications: [] },
        {
          ref: 'git[/srv/app]',
          notifications: [notifies('run', 'execute[migrate]', 'immediately'), notifies('run', 'execute[migrate]', 'immediately')],
        },
      ],
    })

    expect(graph.handlers).toEqual([])
    expect(graph.postActions[1]).toEqual([
      { targetRef: 'execute[migrate]', action: 'run', resolved: true, targetIndex: 0 },
      { targetRef: 'execute[migrate]', action: 'run', resolved: true, targetIndex: 0 },
    ])
  })

  it('reverses subscriptions into edges from the subscribed resource', () => {
    const graph = Notifications.buildGraph({
      source: 'r.rb',
      nodes: [
        { ref: 'template[/etc/app.conf]', notifications: [] },
        { ref: 'service[app]', notifications: [subscribes('restart', 'template[/etc/app.conf]')] },
      ],
    })

    expect(graph.edges).toMatchObject([
      { from: 'template[/etc/app.conf]', to: 'service[app]', action: 'restart', direction: 'subscribes', declaredBy: 1 },
    ])
    expect(graph.handlers).toMatchObject([
      { name: 'Restart service app', targetIndex: 1, triggeredBy: ['template[/etc/app.conf]'] },
    ])
    expect(graph.notifyRefs).toEqual([['Restart service app'], []])
  })

  it('keeps handlers for targets declared elsewhere and warns about them', () => {
    const graph = Notifications.buildGraph({
      source: 'r.rb',
      nodes: [{ ref: 'template[/etc/php.ini]', notifications: [notifies('restart', 'service[php-fpm]')] }],
    })

    expect(graph.handlers).toMatchObject([{ name: 'Restart service php-fpm', resolved: false }])
    expect(graph.handlers[0]?.targetIndex).toBeUndefined()
    expect(graph.diagnostics).toMatchObject([
      {
        kind: 'UnresolvedReference',
        code: ReasonCodes.notifyUnresolvedTarget,
        severity: 'warning',
        resourceRef: 'template[/etc/php.ini]',
        message:
          "notification target 'service[php-fpm]' is not declared in this recipe; resolve it against the rest of the cookbook",
      },
    ])
  })

  it('names handlers from the target reference', () => {
    expect(Notifications.handlerName('reload', 'service[nginx]')).toBe('Reload service nginx')
    expect(Notifications.handlerName('restart', 'nginx')).toBe('Restart nginx')
  })
})
