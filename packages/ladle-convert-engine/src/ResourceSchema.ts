export type { PropertySchema, ResourceDefinition } from './internal/schema/model.js'
export { namePropertyOf } from './internal/schema/model.js'
export type { ParseDefinitionArgs } from './internal/schema/parseDefinition.js'
export { parseResourceDefinition, parseSchema } from './internal/schema/parseDefinition.js'
export { constraintClasses, satisfiesConstraint } from './internal/schema/typeConstraint.js'
