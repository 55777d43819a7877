import type { ValueExpr } from '../value/model.js'
import { keyPathId, PrecedenceRank, type AttributeAssignment, type EffectiveAttribute } from './model.js'

type Candidate = {
  readonly assignment: AttributeAssignment
  readonly keyPath: ReadonlyArray<string>
  readonly value: ValueExpr
  readonly order: number
}

/** Hash values become one leaf per nested key so that later, partial paths merge into them. */
const flatten = (keyPath: ReadonlyArray<string>, value: ValueExpr): ReadonlyArray<{ readonly keyPath: ReadonlyArray<string>; readonly value: ValueExpr }> => {
  if (value.kind !== 'Map' || value.entries.length === 0) return [{ keyPath, value }]
  return value.entries.flatMap((e) => flatten([...keyPath, e.key], e.value))
}

const beats = (challenger: Candidate, holder: Candidate): boolean => {
  const a = PrecedenceRank[challenger.assignment.precedence]
  const b = PrecedenceRank[holder.assignment.precedence]
  if (a !== b) return a > b
  return challenger.order >= holder.order
}

/**
 * One effective value per key path: highest precedence wins, ties go to the last declaration.
 * Results keep the order in which each key path first appears.
 */
export const resolve = (assignments: ReadonlyArray<AttributeAssignment>): ReadonlyArray<EffectiveAttribute> => {
  const winners = new Map<string, Candidate>()
  assignments.forEach((assignment, position) => {
    const order = assignment.index ?? position
    for (const leaf of flatten(assignment.keyPath, assignment.value)) {
      const candidate: Candidate = { assignment, keyPath: leaf.keyPath, value: leaf.value, order }
      const id = keyPathId(leaf.keyPath)
      const holder = winners.get(id)
      if (holder === undefined || beats(candidate, holder)) winners.set(id, candidate)
    }
  })

  return Array.from(winners.values(), (w) => ({
    keyPath: w.keyPath,
    value: w.value,
    winningPrecedence: w.assignment.precedence,
    ...(w.assignment.source !== undefined ? { source: w.assignment.source } : null),
    ...(w.assignment.span !== undefined ? { span: w.assignment.span } : null),
  }))
}
