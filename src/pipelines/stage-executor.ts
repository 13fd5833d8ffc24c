/**
 * Stage Executor Interface - one polymorphic unit of pipeline work
 *
 * Every stage variant (extract, transform, load, validate, custom) exposes a
 * single run(context, signal) capability. Stages only talk to each other
 * through the context's typed variables.
 */

import { v4 as uuidv4 } from 'uuid'
import type { DataRecord } from '../records'
import type {
  ExecutionError,
  ExecutionWarning,
  RetryConfig,
  StageOutcome,
  StageType,
  ValidationResult,
} from '../types'
import { addValidationError, createValidationResult } from '../types'
import { ExpressionEvaluator } from './expression-evaluator'
import type { PipelineContext } from './pipeline-context'
import { errorMessage, toExecutionError } from './errors'

/**
 * Either an expression over the context scope
 * (e.g. "$.variables.records.length > 0") or a predicate
 */
export type StageCondition = string | ((context: PipelineContext) => boolean)

export interface StageOptions {
  name: string
  order: number
  enabled?: boolean
  description?: string
  condition?: StageCondition
  // Parallel scheduling hints, declared by the pipeline author
  independent?: boolean
  variables?: string[]
  // Overrides of the pipeline retry config for this stage
  retry?: Partial<RetryConfig>
}

/**
 * Stage Executor Interface
 */
export interface Stage {
  readonly id: string
  readonly name: string
  readonly type: StageType
  readonly order: number
  readonly enabled: boolean
  readonly description?: string
  readonly condition?: StageCondition
  readonly independent: boolean
  readonly variables: readonly string[]
  readonly retry?: Partial<RetryConfig>

  /**
   * Execute the stage against the shared context
   */
  run(context: PipelineContext, signal: AbortSignal): Promise<StageOutcome>

  /**
   * Validate stage configuration
   */
  validate(): ValidationResult
}

/**
 * Base class with common utilities
 */
export abstract class PipelineStage implements Stage {
  readonly id: string
  readonly name: string
  abstract readonly type: StageType
  readonly order: number
  readonly enabled: boolean
  readonly description?: string
  readonly condition?: StageCondition
  readonly independent: boolean
  readonly variables: readonly string[]
  readonly retry?: Partial<RetryConfig>

  constructor(options: StageOptions) {
    this.id = uuidv4()
    this.name = options.name
    this.order = options.order
    this.enabled = options.enabled ?? true
    this.description = options.description
    this.condition = options.condition
    this.independent = options.independent ?? false
    this.variables = options.variables ?? []
    this.retry = options.retry
  }

  abstract run(context: PipelineContext, signal: AbortSignal): Promise<StageOutcome>

  validate(): ValidationResult {
    const result = createValidationResult()

    if (!this.name || this.name.trim() === '') {
      addValidationError(result, 'Stage name is required', 'name')
    }
    if (!Number.isInteger(this.order) || this.order < 0) {
      addValidationError(result, `Stage "${this.name}" order must be a non-negative integer`, 'order')
    }
    if (typeof this.condition === 'string') {
      try {
        ExpressionEvaluator.validate(this.condition)
      } catch (error) {
        addValidationError(result, `Stage "${this.name}" condition is invalid: ${errorMessage(error)}`, 'condition')
      }
    }

    return result
  }

  /**
   * Source label used on errors and warnings raised by this stage
   */
  protected get errorSource(): string {
    return `Stage: ${this.name}`
  }

  /**
   * Record-level errors raised from index `from` on, as execution errors
   */
  protected recordErrors(record: DataRecord, from = 0): ExecutionError[] {
    return record.errors.slice(from).map(error => ({
      code: error.code,
      message: `${error.source}: ${error.message}`,
      source: this.errorSource,
      severity: error.severity,
      timestamp: error.timestamp,
      stageName: this.name,
      recordId: record.id,
    }))
  }

  protected error(error: unknown, recordId?: string): ExecutionError {
    return toExecutionError(error, this.errorSource, { stageName: this.name, recordId })
  }

  protected warning(message: string, code = 'STAGE_WARNING'): ExecutionWarning {
    return {
      code,
      message,
      source: this.errorSource,
      timestamp: new Date().toISOString(),
      stageName: this.name,
    }
  }
}

/**
 * Evaluate an attached stage condition against the context
 */
export function evaluateStageCondition(condition: StageCondition, context: PipelineContext): boolean {
  if (typeof condition === 'function') {
    return condition(context)
  }
  return ExpressionEvaluator.evaluate(condition, context.toExpressionScope())
}
