export type Pos = { readonly line: number; readonly column: number; readonly offset: number }
export type Span = { readonly start: Pos; readonly end: Pos }

/**
 * Offset → line/column lookup for one source text.
 * Lines and columns are 1-based, offsets 0-based (same convention as the editor-facing spans).
 */
export type LineIndex = {
  readonly text: string
  readonly lineStarts: ReadonlyArray<number>
}

export const makeLineIndex = (text: string): LineIndex => {
  const lineStarts: number[] = [0]
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) === 10) lineStarts.push(i + 1)
  }
  return { text, lineStarts }
}

const lineOfOffset = (index: LineIndex, offset: number): number => {
  let lo = 0
  let hi = index.lineStarts.length - 1
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1
    if ((index.lineStarts[mid] ?? 0) <= offset) lo = mid
    else hi = mid - 1
  }
  return lo
}

export const posAtOffset = (index: LineIndex, offset: number): Pos => {
  const clamped = Math.max(0, Math.min(offset, index.text.length))
  const line = lineOfOffset(index, clamped)
  const lineStart = index.lineStarts[line] ?? 0
  return { line: line + 1, column: clamped - lineStart + 1, offset: clamped }
}

export const spanOfRange = (index: LineIndex, start: number, end: number): Span => ({
  start: posAtOffset(index, start),
  end: posAtOffset(index, end),
})

export const spanAtOffset = (index: LineIndex, offset: number): Span => spanOfRange(index, offset, offset)

export const joinSpans = (a: Span, b: Span): Span => ({
  start: a.start.offset <= b.start.offset ? a.start : b.start,
  end: a.end.offset >= b.end.offset ? a.end : b.end,
})

/** Column of the first non-blank character on the line containing `offset` (1-based). */
export const indentOfLine = (index: LineIndex, offset: number): number => {
  const line = lineOfOffset(index, offset)
  let i = index.lineStarts[line] ?? 0
  let col = 1
  while (i < index.text.length) {
    const ch = index.text[i]
    if (ch !== ' ' && ch !== '\t') break
    col++
    i++
  }
  return col
}
