// Public barrel for @ladle/convert-engine
//   import * as Ladle from '@ladle/convert-engine'
//   Ladle.Convert.convertRecipe({ source, text })

export * as Convert from './Convert.js'
export * as Recipe from './Recipe.js'
export * as Value from './Value.js'
export * as Attributes from './Attributes.js'
export * as Guard from './Guard.js'
export * as Notifications from './Notifications.js'
export * as ResourceSchema from './ResourceSchema.js'
export * as ResourceTable from './ResourceTable.js'
export * as Diagnostics from './Diagnostics.js'
export { ConvertConfig, ConvertConfigTag, DEFAULT_CONVERT_CONFIG, type ConvertConfigShape } from './Config.js'
