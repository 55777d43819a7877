import { makeDiagnostic, type Diagnostic } from '../diagnostics.js'
import type { NotificationTiming } from '../extract/model.js'
import { ReasonCodes } from '../reasonCodes.js'
import type { Span } from '../span.js'
import { parseTargetRef } from './targetRef.js'

/** One declaration as seen by the graph builder: its own ref and its notifications with targets already rendered. */
export type GraphNode = {
  readonly ref: string
  readonly notifications: ReadonlyArray<{
    readonly action: string
    readonly targetRef: string
    readonly timing: NotificationTiming
    readonly direction: 'notifies' | 'subscribes'
    readonly span: Span
  }>
}

export type NotificationEdge = {
  /** Ref of the resource whose change fires the edge. */
  readonly from: string
  /** Ref of the resource that runs `action`. */
  readonly to: string
  readonly action: string
  readonly timing: NotificationTiming
  readonly direction: 'notifies' | 'subscribes'
  readonly span: Span
  /** Index of the declaring node. */
  readonly declaredBy: number
}

export type HandlerSpec = {
  readonly name: string
  readonly targetRef: string
  readonly action: string
  /** Index of the target declaration in this recipe, absent for cross-file targets. */
  readonly targetIndex?: number
  readonly resolved: boolean
  readonly triggeredBy: ReadonlyArray<string>
  readonly span: Span
}

export type PostAction = {
  readonly targetRef: string
  readonly action: string
  readonly targetIndex?: number
  readonly resolved: boolean
}

export type NotificationGraph = {
  readonly edges: ReadonlyArray<NotificationEdge>
  readonly handlers: ReadonlyArray<HandlerSpec>
  /** Per node: names of the handlers it notifies (delayed). */
  readonly notifyRefs: ReadonlyArray<ReadonlyArray<string>>
  /** Per node: actions run right after it (immediate). */
  readonly postActions: ReadonlyArray<ReadonlyArray<PostAction>>
  readonly diagnostics: ReadonlyArray<Diagnostic>
}

const capitalize = (s: string): string => (s.length === 0 ? s : `${s[0]?.toUpperCase() ?? ''}${s.slice(1)}`)

export const handlerName = (action: string, targetRef: string): string => {
  const ref = parseTargetRef(targetRef)
  return ref !== undefined ? `${capitalize(action)} ${ref.type} ${ref.name}` : `${capitalize(action)} ${targetRef}`
}

/**
 * Delayed edges collapse into one handler per (target, action), in first-seen order; immediate edges stay on the
 * triggering node and never collapse.
 */
export const buildGraph = (args: { readonly source: string; readonly nodes: ReadonlyArray<GraphNode> }): NotificationGraph => {
  const { source, nodes } = args
  const indexByRef = new Map<string, number>()
  nodes.forEach((node, i) => {
    if (!indexByRef.has(node.ref)) indexByRef.set(node.ref, i)
  })

  const edges: NotificationEdge[] = []
  const diagnostics: Diagnostic[] = []
  const handlers = new Map<string, { spec: HandlerSpec; triggeredBy: string[] }>()
  const notifyRefs: string[][] = nodes.map(() => [])
  const postActions: PostAction[][] = nodes.map(() => [])

  const unresolved = (ref: string, span: Span, declaredBy: string, message: string): void => {
    diagnostics.push(
      makeDiagnostic({
        kind: 'UnresolvedReference',
        code: ReasonCodes.notifyUnresolvedTarget,
        message: `${message} '${ref}' is not declared in this recipe; resolve it against the rest of the cookbook`,
        source,
        span,
        resourceRef: declaredBy,
      }),
    )
  }

  nodes.forEach((node, declaredBy) => {
    for (const n of node.notifications) {
      const edge: NotificationEdge =
        n.direction === 'notifies'
          ? { from: node.ref, to: n.targetRef, action: n.action, timing: n.timing, direction: n.direction, span: n.span, declaredBy }
          : { from: n.targetRef, to: node.ref, action: n.action, timing: n.timing, direction: n.direction, span: n.span, declaredBy }
      edges.push(edge)

      const fromIndex = indexByRef.get(edge.from)
      const toIndex = indexByRef.get(edge.to)
      if (n.direction === 'notifies' && toIndex === undefined) unresolved(edge.to, n.span, node.ref, 'notification target')
      if (n.direction === 'subscribes' && fromIndex === undefined) unresolved(edge.from, n.span, node.ref, 'subscribed resource')

      if (edge.timing === 'immediately') {
        if (fromIndex === undefined) continue
        postActions[fromIndex]?.push({
          targetRef: edge.to,
          action: edge.action,
          resolved: toIndex !== undefined,
          ...(toIndex !== undefined ? { targetIndex: toIndex } : null),
        })
        continue
      }

      const key = `${edge.to}\u0000${edge.action}`
      let handler = handlers.get(key)
      if (handler === undefined) {
        handler = {
          spec: {
            name: handlerName(edge.action, edge.to),
            targetRef: edge.to,
            action: edge.action,
            resolved: toIndex !== undefined,
            ...(toIndex !== undefined ? { targetIndex: toIndex } : null),
            triggeredBy: [],
            span: n.span,
          },
          triggeredBy: [],
        }
        handlers.set(key, handler)
      }
      if (!handler.triggeredBy.includes(edge.from)) handler.triggeredBy.push(edge.from)
      if (fromIndex !== undefined) {
        const refs = notifyRefs[fromIndex]
        if (refs !== undefined && !refs.includes(handler.spec.name)) refs.push(handler.spec.name)
      }
    }
  })

  return {
    edges,
    handlers: Array.from(handlers.values(), (h) => ({ ...h.spec, triggeredBy: h.triggeredBy })),
    notifyRefs,
    postActions,
    diagnostics,
  }
}
