import { interpolation, list, map, type MapEntry, type ValueExpr } from '../value/model.js'
import { keyPathId, type EffectiveAttribute } from './model.js'

export type AttributeTable = {
  readonly effective: ReadonlyArray<EffectiveAttribute>
  /** Effective value at a path as declared (references not followed); a parent path yields the merged `Map`. */
  readonly get: (keyPath: ReadonlyArray<string>) => ValueExpr | undefined
}

export type ResolvedValue = {
  readonly value: ValueExpr
  /** Attribute paths with no effective value. */
  readonly unresolved: ReadonlyArray<ReadonlyArray<string>>
  /** Paths whose value refers back to itself. */
  readonly cycles: ReadonlyArray<ReadonlyArray<string>>
}

type Tree = { value?: ValueExpr; readonly children: Map<string, Tree> }

const toValue = (tree: Tree): ValueExpr => {
  if (tree.children.size === 0) return tree.value ?? map([])
  const entries: MapEntry[] = Array.from(tree.children, ([key, child]) => ({ key, value: toValue(child) }))
  return map(entries)
}

export const makeTable = (effective: ReadonlyArray<EffectiveAttribute>): AttributeTable => {
  const exact = new Map<string, EffectiveAttribute>()
  for (const e of effective) exact.set(keyPathId(e.keyPath), e)

  const descendants = (keyPath: ReadonlyArray<string>): ValueExpr | undefined => {
    const root: Tree = { children: new Map() }
    let found = false
    for (const e of effective) {
      if (e.keyPath.length <= keyPath.length || !keyPath.every((k, i) => e.keyPath[i] === k)) continue
      found = true
      let node = root
      for (const key of e.keyPath.slice(keyPath.length)) {
        let child = node.children.get(key)
        if (child === undefined) {
          child = { children: new Map() }
          node.children.set(key, child)
        }
        node = child
      }
      node.value = e.value
    }
    return found ? toValue(root) : undefined
  }

  return {
    effective,
    get: (keyPath) => exact.get(keyPathId(keyPath))?.value ?? descendants(keyPath),
  }
}

/** Replaces node attribute paths inside `value` with their effective values, following references recursively. */
export const resolveValue = (table: AttributeTable, value: ValueExpr): ResolvedValue => {
  const unresolved: ReadonlyArray<string>[] = []
  const cycles: ReadonlyArray<string>[] = []

  const walk = (v: ValueExpr, visiting: ReadonlySet<string>): ValueExpr => {
    switch (v.kind) {
      case 'AttributePath': {
        if (v.scope === 'new_resource') return v
        const id = keyPathId(v.keys)
        if (visiting.has(id)) {
          cycles.push(v.keys)
          return v
        }
        const found = table.get(v.keys)
        if (found === undefined) {
          unresolved.push(v.keys)
          return v
        }
        return walk(found, new Set([...visiting, id]))
      }
      case 'Interpolation':
        return interpolation(v.segments.map((s) => walk(s, visiting)))
      case 'List':
        return list(v.items.map((item) => walk(item, visiting)))
      case 'Map':
        return map(v.entries.map((e) => ({ key: e.key, value: walk(e.value, visiting) })))
      default:
        return v
    }
  }

  return { value: walk(value, new Set()), unresolved, cycles }
}
