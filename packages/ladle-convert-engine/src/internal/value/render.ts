import { scalarText, type AttributePathValue, type TaskValue, type ValueExpr } from './model.js'

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

/** Jinja-style variable reference for an attribute path (`app.port`, `app['log-dir']`). */
export const variableName = (value: AttributePathValue): string =>
  value.keys
    .map((key, i) => (IDENTIFIER.test(key) ? (i === 0 ? key : `.${key}`) : i === 0 ? `vars['${key}']` : `['${key}']`))
    .join('')

/** Expression text usable inside a `{{ }}` or a `when:` clause. */
export const renderExpression = (value: ValueExpr): string => {
  switch (value.kind) {
    case 'Literal':
      if (value.value === null) return 'none'
      if (typeof value.value === 'string') return `'${value.value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`
      return String(value.value)
    case 'AttributePath':
      return variableName(value)
    case 'Interpolation':
      return value.segments.map(renderExpression).join(' ~ ')
    case 'List':
      return `[${value.items.map(renderExpression).join(', ')}]`
    case 'Map':
      return `{${value.entries.map((e) => `'${e.key}': ${renderExpression(e.value)}`).join(', ')}}`
    case 'Opaque':
      return value.raw
  }
}

/** Template string: literals as text, dynamic pieces as `{{ ... }}`. */
export const render = (value: ValueExpr): string => {
  switch (value.kind) {
    case 'Literal':
      return scalarText(value.value)
    case 'AttributePath':
      return `{{ ${variableName(value)} }}`
    case 'Interpolation':
      return value.segments.map(render).join('')
    case 'List':
    case 'Map':
      return `{{ ${renderExpression(value)} }}`
    case 'Opaque':
      return value.raw
  }
}

export const toTaskValue = (value: ValueExpr): TaskValue => {
  switch (value.kind) {
    case 'Literal':
      return value.value
    case 'AttributePath':
    case 'Interpolation':
    case 'Opaque':
      return render(value)
    case 'List':
      return value.items.map(toTaskValue)
    case 'Map':
      return Object.fromEntries(value.entries.map((e) => [e.key, toTaskValue(e.value)]))
  }
}
