/**
 * Pipeline System Exports
 */

// Core model
export * from './pipeline'
export * from './pipeline-context'
export * from './pipeline-builder'
export * from './pipeline-orchestrator'
export * from './pipeline-events'

// Stages
export * from './stage-executor'
export * from './builtin-stages'

// Conditions and errors
export * from './expression-evaluator'
export * from './errors'
