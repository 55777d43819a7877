import type { ValueExpr } from '../value/model.js'

const CLASS_ALIASES: { readonly [written: string]: string } = {
  true: 'TrueClass',
  false: 'FalseClass',
  nil: 'NilClass',
  Fixnum: 'Integer',
  Bignum: 'Integer',
}

/** Class names listed in a constraint such as `String` or `[String, Integer, nil]`. */
export const constraintClasses = (constraint: string): ReadonlyArray<string> =>
  constraint
    .replace(/^\[|\]$/g, '')
    .split(',')
    .map((part) => part.trim().replace(/^::/, ''))
    .filter((part) => part.length > 0)
    .map((part) => CLASS_ALIASES[part] ?? part)

/** Classes a value can have; empty when only known at converge time. */
const classesOf = (value: ValueExpr): ReadonlyArray<string> => {
  switch (value.kind) {
    case 'Literal': {
      const v = value.value
      if (v === null) return ['NilClass']
      if (typeof v === 'boolean') return [v ? 'TrueClass' : 'FalseClass', 'Boolean']
      if (typeof v === 'number') return Number.isInteger(v) ? ['Integer', 'Numeric'] : ['Float', 'Numeric']
      // file modes are written as numbers and kept as strings
      if (value.symbol) return ['Symbol']
      return /^0[0-7]+$/.test(v) ? ['String', 'Integer', 'Numeric'] : ['String']
    }
    case 'Interpolation':
      return ['String']
    case 'List':
      return ['Array']
    case 'Map':
      return ['Hash']
    default:
      return []
  }
}

/** `true`/`false` when the value's class can be decided, `undefined` otherwise (attribute paths, opaque code). */
export const satisfiesConstraint = (constraint: string, value: ValueExpr): boolean | undefined => {
  const allowed = constraintClasses(constraint)
  const actual = classesOf(value)
  if (actual.length === 0 || allowed.length === 0) return undefined
  // constraints that are not plain class names (regexes, callbacks) are not checked
  if (!allowed.every((c) => /^[A-Z][A-Za-z:]*$/.test(c))) return undefined
  return actual.some((c) => allowed.includes(c)) || allowed.includes('Object')
}
