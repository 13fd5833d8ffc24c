/**
 * Shared execution types
 *
 * Statuses, errors, warnings and result shapes produced by stages and the
 * orchestrator. Everything here is plain data so results can be logged,
 * published as events or serialized by a caller.
 */

export type StageType = 'extract' | 'transform' | 'load' | 'validate' | 'custom'

export const STAGE_TYPES: readonly StageType[] = ['extract', 'transform', 'load', 'validate', 'custom']

/**
 * Per-execution stage state machine:
 * ready -> running -> completed | failed | cancelled | skipped
 */
export type StageStatus = 'ready' | 'running' | 'completed' | 'failed' | 'cancelled' | 'skipped'

export type PipelineStatus = 'ready' | 'running' | 'completed' | 'failed' | 'cancelled'

export type ErrorSeverity = 'low' | 'medium' | 'high' | 'error' | 'critical'

export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'TRANSIENT_ADAPTER_ERROR'
  | 'FATAL_ADAPTER_ERROR'
  | 'VALIDATION_ERROR'
  | 'RULE_ACTION_ERROR'
  | 'MAPPING_ERROR'
  | 'CANCELLED'
  | 'STAGE_FAILED'
  | 'CONCURRENCY_LIMIT'

/**
 * One entry of the execution error list
 */
export interface ExecutionError {
  code: ErrorCode
  message: string
  source: string
  severity: ErrorSeverity
  timestamp: string
  stageName?: string
  recordId?: string
  cause?: unknown
}

export interface ExecutionWarning {
  code: string
  message: string
  source: string
  timestamp: string
  stageName?: string
}

/**
 * RetryConfig - how transient stage failures are retried
 *
 * maxAttempts counts retries after the first invocation.
 */
export interface RetryConfig {
  maxAttempts: number
  delayMs: number
  backoffMultiplier: number
  maxDelayMs: number
  jitter: boolean
  retryableErrors?: string[] // Message fragments treated as transient
}

export interface ErrorHandlingPolicy {
  stopOnError: boolean
  maxErrors: number
  errorThreshold?: number // errors / recordsProcessed ratio, disabled when unset
  continueOnStageFailure: boolean
}

export interface ParallelConfig {
  enabled: boolean
  maxDegreeOfParallelism: number
}

export interface PipelineSettings {
  errorHandling: ErrorHandlingPolicy
  retry: RetryConfig
  parallel: ParallelConfig
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  delayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  jitter: false,
}

export const NO_RETRY: RetryConfig = {
  maxAttempts: 0,
  delayMs: 0,
  backoffMultiplier: 1,
  maxDelayMs: 0,
  jitter: false,
}

export const DEFAULT_ERROR_HANDLING: ErrorHandlingPolicy = {
  stopOnError: false,
  maxErrors: 100,
  continueOnStageFailure: true,
}

export const DEFAULT_PARALLEL_CONFIG: ParallelConfig = {
  enabled: false,
  maxDegreeOfParallelism: 4,
}

export function resolveSettings(settings?: DeepPartialSettings): PipelineSettings {
  return {
    errorHandling: { ...DEFAULT_ERROR_HANDLING, ...settings?.errorHandling },
    retry: { ...DEFAULT_RETRY_CONFIG, ...settings?.retry },
    parallel: { ...DEFAULT_PARALLEL_CONFIG, ...settings?.parallel },
  }
}

export interface DeepPartialSettings {
  errorHandling?: Partial<ErrorHandlingPolicy>
  retry?: Partial<RetryConfig>
  parallel?: Partial<ParallelConfig>
}

/**
 * Outcome of one stage within one execution
 */
export interface StageResult {
  stageName: string
  stageType: StageType
  order: number
  status: StageStatus
  isSuccess: boolean
  startTime: string
  endTime: string
  durationMs: number
  recordsProcessed: number
  recordsSuccessful: number
  recordsFailed: number
  attempts: number
  errors: ExecutionError[]
  warnings: ExecutionWarning[]
  metadata: Record<string, unknown>
}

/**
 * What a stage's run() reports back; the orchestrator fills in timing,
 * status and attempt counts
 */
export interface StageOutcome {
  isSuccess: boolean
  recordsProcessed: number
  recordsSuccessful?: number
  recordsFailed?: number
  errors?: ExecutionError[]
  warnings?: ExecutionWarning[]
  metadata?: Record<string, unknown>
}

export interface StageStatistics {
  status: StageStatus
  durationMs: number
  recordsProcessed: number
  recordsFailed: number
  attempts: number
}

/**
 * Counters kept on the context while a run is in flight
 */
export interface RunningStatistics {
  recordsProcessed: number
  recordsFailed: number
  stagesExecuted: number
  stagesSkipped: number
  stagesFailed: number
  retries: number
  stages: Record<string, StageStatistics>
}

export interface ExecutionStatistics {
  totalRecords: number
  successfulRecords: number
  failedRecords: number
  stagesExecuted: number
  stagesSkipped: number
  stagesFailed: number
  retries: number
  processingRate: number // records per second
  stages: Record<string, StageStatistics>
}

export interface PipelineExecutionResult {
  executionId: string
  pipelineId: string
  pipelineName: string
  status: PipelineStatus
  isSuccess: boolean
  startTime: string
  endTime: string
  durationMs: number
  recordsProcessed: number
  recordsSuccessful: number
  recordsFailed: number
  stageResults: StageResult[]
  errors: ExecutionError[]
  warnings: ExecutionWarning[]
  statistics: ExecutionStatistics
}

export interface ValidationIssue {
  message: string
  path?: string
}

export interface ValidationResult {
  isValid: boolean
  errors: ValidationIssue[]
  warnings: ValidationIssue[]
}

export function createValidationResult(): ValidationResult {
  return { isValid: true, errors: [], warnings: [] }
}

export function addValidationError(result: ValidationResult, message: string, path?: string): void {
  result.errors.push({ message, path })
  result.isValid = false
}
