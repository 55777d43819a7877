export type {
  ContextCondition,
  Guard,
  GuardForm,
  GuardKind,
  Notification,
  NotificationTiming,
  Property,
  ResourceDeclaration,
} from './internal/extract/model.js'
export type { ExtractArgs, ExtractResult } from './internal/extract/extractDeclarations.js'
export { extractDeclarations } from './internal/extract/extractDeclarations.js'
export { formatResourceRef, parseTargetRef, type TargetRef } from './internal/notify/targetRef.js'
