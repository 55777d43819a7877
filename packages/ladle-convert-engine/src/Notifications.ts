export type { GraphNode, HandlerSpec, NotificationEdge, NotificationGraph, PostAction } from './internal/notify/graph.js'
export { buildGraph, handlerName } from './internal/notify/graph.js'
