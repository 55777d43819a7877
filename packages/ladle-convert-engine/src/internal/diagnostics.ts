import type { ReasonCode } from './reasonCodes.js'
import type { Span } from './span.js'

export type DiagnosticKind = 'StructuralParseError' | 'UnrecognizedConstruct' | 'UnresolvedReference' | 'SchemaViolation'

export type Severity = 'warning' | 'error'

export type Diagnostic = {
  readonly kind: DiagnosticKind
  readonly code: ReasonCode
  readonly severity: Severity
  readonly message: string
  readonly source: string
  readonly span: Span
  /** `type[name]` of the declaration the diagnostic belongs to, when there is one. */
  readonly resourceRef?: string
}

const severityOf = (kind: DiagnosticKind): Severity => (kind === 'StructuralParseError' ? 'error' : 'warning')

export const makeDiagnostic = (args: {
  readonly kind: DiagnosticKind
  readonly code: ReasonCode
  readonly message: string
  readonly source: string
  readonly span: Span
  readonly resourceRef?: string
}): Diagnostic => ({
  kind: args.kind,
  code: args.code,
  severity: severityOf(args.kind),
  message: args.message,
  source: args.source,
  span: args.span,
  ...(args.resourceRef !== undefined ? { resourceRef: args.resourceRef } : null),
})

export const withResourceRef = (diagnostic: Diagnostic, resourceRef: string): Diagnostic =>
  diagnostic.resourceRef !== undefined ? diagnostic : { ...diagnostic, resourceRef }

export const countBySeverity = (diagnostics: ReadonlyArray<Diagnostic>, severity: Severity): number =>
  diagnostics.filter((d) => d.severity === severity).length
