export type { Diagnostic, DiagnosticKind, Severity } from './internal/diagnostics.js'
export { countBySeverity } from './internal/diagnostics.js'
export { ReasonCodes, type ReasonCode } from './internal/reasonCodes.js'
export type { Pos, Span } from './internal/span.js'
