/**
 * Configuration module
 * YAML pipeline files with Zod validation, environment overrides and
 * construction of runnable pipelines from validated definitions
 */

export * from './schema'
export * from './loader'
export * from './environment'
export * from './pipeline-factory'
