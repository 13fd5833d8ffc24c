/**
 * Zod schemas for pipeline definition files
 * Validates YAML config files
 */

import { z } from 'zod'
import { CONDITION_OPERATORS } from '../transformation/rules/rule-builder'
import { DEFAULT_ERROR_HANDLING, DEFAULT_PARALLEL_CONFIG, DEFAULT_RETRY_CONFIG } from '../types'

/**
 * Error handling policy
 */
export const ErrorHandlingSchema = z.object({
  stopOnError: z.boolean().default(DEFAULT_ERROR_HANDLING.stopOnError),
  maxErrors: z.number().int().min(0).default(DEFAULT_ERROR_HANDLING.maxErrors),
  errorThreshold: z.number().min(0).optional(),
  continueOnStageFailure: z.boolean().default(DEFAULT_ERROR_HANDLING.continueOnStageFailure),
})

/**
 * Retry policy for transient stage failures
 */
export const RetrySchema = z.object({
  maxAttempts: z.number().int().min(0).default(DEFAULT_RETRY_CONFIG.maxAttempts),
  delayMs: z.number().int().min(0).default(DEFAULT_RETRY_CONFIG.delayMs),
  backoffMultiplier: z.number().min(1).default(DEFAULT_RETRY_CONFIG.backoffMultiplier),
  maxDelayMs: z.number().int().min(0).default(DEFAULT_RETRY_CONFIG.maxDelayMs),
  jitter: z.boolean().default(DEFAULT_RETRY_CONFIG.jitter),
  retryableErrors: z.array(z.string()).optional(),
})

export const ParallelSchema = z.object({
  enabled: z.boolean().default(DEFAULT_PARALLEL_CONFIG.enabled),
  maxDegreeOfParallelism: z.number().int().positive().default(DEFAULT_PARALLEL_CONFIG.maxDegreeOfParallelism),
})

export const SettingsSchema = z.object({
  errorHandling: ErrorHandlingSchema.default({}),
  retry: RetrySchema.default({}),
  parallel: ParallelSchema.default({}),
})

export const AdapterConfigSchema = z.object({
  connectorType: z.string().min(1),
  connectionString: z.string(),
  batchSize: z.number().int().positive().default(1000),
  options: z.record(z.unknown()).optional(),
})

const TransformDefinitionSchema = z.union([
  z.string(),
  z.object({ name: z.string(), args: z.record(z.unknown()).optional() }),
])

const ConditionSchema = z.object({
  field: z.string(),
  operator: z.enum(CONDITION_OPERATORS),
  value: z.unknown(),
})

const ActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('setField'), field: z.string(), value: z.unknown() }),
  z.object({ type: z.literal('removeField'), field: z.string() }),
  z.object({ type: z.literal('copyField'), from: z.string(), to: z.string() }),
  z.object({
    type: z.literal('transformField'),
    field: z.string(),
    transform: TransformDefinitionSchema,
    target: z.string().optional(),
  }),
  z.object({ type: z.literal('skipRecord') }),
  z.object({ type: z.literal('stopProcessing') }),
])

export const RuleDefinitionSchema = z.object({
  name: z.string().min(1),
  priority: z.number().default(0),
  enabled: z.boolean().default(true),
  description: z.string().optional(),
  conditions: z.array(ConditionSchema).optional(),
  when: z.string().optional(),
  actions: z.array(ActionSchema).min(1),
})

export const MappingDefinitionSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('field'),
    source: z.string().min(1),
    target: z.string().min(1),
    transforms: z.array(TransformDefinitionSchema).optional(),
    default: z.unknown(),
    required: z.boolean().optional(),
  }),
  z.object({ type: z.literal('constant'), target: z.string().min(1), value: z.unknown() }),
  z.object({
    type: z.literal('conditional'),
    target: z.string().min(1),
    condition: z.string().min(1),
    whenTrue: z.unknown(),
    whenFalse: z.unknown(),
  }),
])

export const ValidatorDefinitionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('required'), field: z.string() }),
  z.object({ type: z.literal('type'), field: z.string(), expected: z.enum(['string', 'number', 'boolean', 'date']) }),
  z.object({ type: z.literal('pattern'), field: z.string(), pattern: z.string(), message: z.string().optional() }),
  z.object({ type: z.literal('range'), field: z.string(), min: z.number().optional(), max: z.number().optional() }),
  z.object({ type: z.literal('length'), field: z.string(), min: z.number().int().optional(), max: z.number().int().optional() }),
])

const StageBaseSchema = z.object({
  name: z.string().min(1),
  order: z.number().int().min(0),
  enabled: z.boolean().default(true),
  description: z.string().optional(),
  // Expression over { pipelineId, pipelineName, executionId, errorCount, statistics, variables }
  condition: z.string().optional(),
  independent: z.boolean().default(false),
  variables: z.array(z.string()).optional(),
  retry: RetrySchema.partial().optional(),
})

export const StageDefinitionSchema = z.discriminatedUnion('type', [
  StageBaseSchema.extend({
    type: z.literal('extract'),
    adapter: AdapterConfigSchema,
    output: z.string().optional(),
  }),
  StageBaseSchema.extend({
    type: z.literal('transform'),
    rules: z.array(RuleDefinitionSchema).optional(),
    mappings: z.array(MappingDefinitionSchema).optional(),
    input: z.string().optional(),
    output: z.string().optional(),
  }),
  StageBaseSchema.extend({
    type: z.literal('validate'),
    validators: z.array(ValidatorDefinitionSchema).min(1),
    dropInvalid: z.boolean().default(false),
    input: z.string().optional(),
    output: z.string().optional(),
  }),
  StageBaseSchema.extend({
    type: z.literal('load'),
    adapter: AdapterConfigSchema,
    input: z.string().optional(),
  }),
  StageBaseSchema.extend({
    type: z.literal('custom'),
    // Name of a handler supplied to the pipeline factory
    handler: z.string().min(1),
  }),
])

export const PipelineDefinitionSchema = z.object({
  id: z.string().optional(),
  name: z.string().min(1),
  description: z.string().default(''),
  settings: SettingsSchema.default({}),
  stages: z.array(StageDefinitionSchema).min(1),
})

export const OrchestratorConfigSchema = z.object({
  eventTimeoutMs: z.number().int().positive().default(5000),
  historyLimit: z.number().int().positive().default(100),
  maxConcurrentExecutions: z.number().int().positive().default(10),
})

export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
})

/**
 * Complete pipeline file
 */
export const PipelineConfigSchema = z.object({
  pipeline: PipelineDefinitionSchema,
  orchestrator: OrchestratorConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
})

export type AdapterConfigDefinition = z.infer<typeof AdapterConfigSchema>
export type StageDefinition = z.infer<typeof StageDefinitionSchema>
export type PipelineDefinition = z.infer<typeof PipelineDefinitionSchema>
export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>

/**
 * Validate config
 */
export function validatePipelineConfig(config: unknown): PipelineConfig {
  return PipelineConfigSchema.parse(config)
}

/**
 * Validate config with detailed error messages
 */
export function validatePipelineConfigSafe(
  config: unknown
): { success: true; data: PipelineConfig } | { success: false; errors: string[] } {
  const result = PipelineConfigSchema.safeParse(config)

  if (result.success) {
    return { success: true, data: result.data }
  }

  const errors = result.error.issues.map(err => {
    const path = err.path.join('.')
    return `${path}: ${err.message}`
  })

  return { success: false, errors }
}
