export * from './rules/rule-engine'
export * from './rules/rule-builder'
export * from './mapping/data-mapper'
export * from './mapping/field-transformations'
export * from './validation/field-validators'
