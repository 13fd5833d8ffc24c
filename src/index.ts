// Core exports
export * from './types'
export * from './records'
export * from './runtime'
export * from './observability'

// Pipeline exports
export * from './pipelines'

// Rules, mapping and validation
export * from './transformation'

// Source and destination adapters
export * from './adapters'

// Configuration exports
export * from './config'
