import { interpolation, literal, type ValueExpr } from '../value/model.js'
import { render } from '../value/render.js'
import { Not, Test, type BoolExpr, type TestKind } from './model.js'

type CommandPattern = {
  readonly re: RegExp
  readonly test: TestKind | ((m: RegExpExecArray) => TestKind)
  /** Group holding the subject. */
  readonly subject: number
  /** Group that, when present, negates the test. */
  readonly negation?: number
}

const PATH_FLAGS: { readonly [flag: string]: TestKind } = {
  e: 'path_exists',
  f: 'file_exists',
  d: 'directory_exists',
}

const pathTest = (m: RegExpExecArray): TestKind => PATH_FLAGS[m[2] ?? 'e'] ?? 'path_exists'

const SUBJECT = String.raw`("[^"]*"|'[^']*'|\S+)`

const PATTERNS: ReadonlyArray<CommandPattern> = [
  { re: new RegExp(String.raw`^test\s+(!\s+)?-([efd])\s+${SUBJECT}$`), test: pathTest, subject: 3, negation: 1 },
  { re: new RegExp(String.raw`^\[\[?\s+(!\s+)?-([efd])\s+${SUBJECT}\s+\]\]?$`), test: pathTest, subject: 3, negation: 1 },
  { re: new RegExp(String.raw`^which\s+${SUBJECT}$`), test: 'command_available', subject: 1 },
  { re: new RegExp(String.raw`^command\s+-v\s+${SUBJECT}$`), test: 'command_available', subject: 1 },
  { re: new RegExp(String.raw`^systemctl\s+is-active\s+(?:(?:--quiet|-q)\s+)?${SUBJECT}$`), test: 'service_active', subject: 1 },
  { re: new RegExp(String.raw`^systemctl\s+is-enabled\s+(?:(?:--quiet|-q)\s+)?${SUBJECT}$`), test: 'service_enabled', subject: 1 },
  { re: new RegExp(String.raw`^service\s+${SUBJECT}\s+status$`), test: 'service_active', subject: 1 },
  { re: new RegExp(String.raw`^pgrep\s+(?:-f\s+)?${SUBJECT}$`), test: 'process_running', subject: 1 },
  { re: new RegExp(String.raw`^dpkg\s+-[sl]\s+${SUBJECT}$`), test: 'package_installed', subject: 1 },
  { re: new RegExp(String.raw`^rpm\s+-q\s+${SUBJECT}$`), test: 'package_installed', subject: 1 },
  { re: new RegExp(String.raw`^id\s+(?:-u\s+)?${SUBJECT}$`), test: 'user_exists', subject: 1 },
  { re: new RegExp(String.raw`^getent\s+passwd\s+${SUBJECT}$`), test: 'user_exists', subject: 1 },
  { re: new RegExp(String.raw`^getent\s+group\s+${SUBJECT}$`), test: 'group_exists', subject: 1 },
]

const REDIRECTIONS = /(\s*(?:[12]?>>?\s*\/dev\/null|2>&1|&>\s*\/dev\/null))+\s*$/

const MARK = '\u0000'

/**
 * Renders the command with every dynamic segment replaced by a marker, so patterns can match the text while
 * subjects keep their attribute references.
 */
const withMarkers = (command: ValueExpr): { readonly text: string; readonly dynamic: ReadonlyArray<ValueExpr> } | undefined => {
  if (command.kind === 'Literal') return typeof command.value === 'string' ? { text: command.value, dynamic: [] } : undefined
  if (command.kind === 'AttributePath') return { text: `${MARK}0${MARK}`, dynamic: [command] }
  if (command.kind !== 'Interpolation') return undefined
  const dynamic: ValueExpr[] = []
  let text = ''
  for (const segment of command.segments) {
    if (segment.kind === 'Literal') text += render(segment)
    else {
      text += `${MARK}${dynamic.length}${MARK}`
      dynamic.push(segment)
    }
  }
  return { text, dynamic }
}

const subjectValue = (raw: string, dynamic: ReadonlyArray<ValueExpr>): ValueExpr => {
  const unquoted = /^(["']).*\1$/s.test(raw) ? raw.slice(1, -1) : raw
  const pieces = unquoted.split(MARK)
  const segments = pieces.map((piece, i) => (i % 2 === 1 ? (dynamic[Number(piece)] ?? literal(piece)) : literal(piece)))
  return interpolation(segments)
}

/** Translates a recognized shell command into a test; `undefined` when no pattern matches. */
export const matchCommand = (command: ValueExpr): BoolExpr | undefined => {
  const marked = withMarkers(command)
  if (marked === undefined) return undefined
  const text = marked.text.trim().replace(REDIRECTIONS, '')
  for (const pattern of PATTERNS) {
    const m = pattern.re.exec(text)
    if (m === null) continue
    const raw = m[pattern.subject]
    if (raw === undefined) continue
    const test = typeof pattern.test === 'function' ? pattern.test(m) : pattern.test
    const expr = Test(test, subjectValue(raw, marked.dynamic))
    const negated = pattern.negation !== undefined && m[pattern.negation] !== undefined
    return negated ? Not(expr) : expr
  }
  return undefined
}
