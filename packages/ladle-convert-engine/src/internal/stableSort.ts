import type { Span } from './span.js'

const compare = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)

const compareSpan = (a: Span, b: Span): number => {
  if (a.start.offset !== b.start.offset) return a.start.offset - b.start.offset
  if (a.end.offset !== b.end.offset) return a.end.offset - b.end.offset
  return 0
}

/** Stable: items with equal file and span keep their input order. */
export const sortBySourceSpan = <T extends { readonly source: string; readonly span: Span }>(
  items: ReadonlyArray<T>,
): ReadonlyArray<T> =>
  Array.from(items)
    .map((item, i) => ({ item, i }))
    .sort((x, y) => {
      const c = compare(x.item.source, y.item.source)
      if (c !== 0) return c
      const s = compareSpan(x.item.span, y.item.span)
      return s !== 0 ? s : x.i - y.i
    })
    .map((x) => x.item)
