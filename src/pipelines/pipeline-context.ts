/**
 * Pipeline Context - per-execution shared state
 *
 * Stages never reference each other; they hand data along through typed
 * variable keys. The context also collects errors, warnings, progress and
 * running statistics for the whole execution.
 */

import { v4 as uuidv4 } from 'uuid'
import type { Logger } from 'pino'
import type { DataRecord } from '../records'
import type {
  ExecutionError,
  ExecutionWarning,
  PipelineSettings,
  RunningStatistics,
  StageResult,
  StageStatus,
} from '../types'

// ============================================================================
// Typed variable registry
// ============================================================================

declare const variableType: unique symbol

/**
 * Typed handle for one slot of the variable store. Two keys with the same
 * name address the same slot.
 */
export interface VariableKey<T> {
  readonly name: string
  readonly description?: string
  readonly [variableType]?: T
}

export function defineVariable<T>(name: string, description?: string): VariableKey<T> {
  return { name, description }
}

/**
 * Default slot Extract stages write to and Transform/Load stages read from
 */
export const RECORDS = defineVariable<DataRecord[]>('records', 'Records handed from stage to stage')

interface VariableSlot {
  value: unknown
  writtenBy?: string
  updatedAt: string
}

export class VariableStore {
  private readonly slots = new Map<string, VariableSlot>()

  get<T>(key: VariableKey<T>): T | undefined {
    const slot = this.slots.get(key.name)
    // Slots are only ever written through set() with a key of the same type
    return slot?.value as T | undefined
  }

  /**
   * Like get() but fails when the slot is empty
   */
  require<T>(key: VariableKey<T>): T {
    const value = this.get(key)
    if (value === undefined) {
      throw new Error(`Pipeline variable "${key.name}" has not been set`)
    }
    return value
  }

  set<T>(key: VariableKey<T>, value: T, writtenBy?: string): void {
    this.slots.set(key.name, { value, writtenBy, updatedAt: new Date().toISOString() })
  }

  has(key: VariableKey<unknown>): boolean {
    return this.slots.has(key.name)
  }

  delete(key: VariableKey<unknown>): boolean {
    return this.slots.delete(key.name)
  }

  keys(): string[] {
    return Array.from(this.slots.keys())
  }

  writerOf(key: VariableKey<unknown>): string | undefined {
    return this.slots.get(key.name)?.writtenBy
  }

  /**
   * Plain-object view used for condition expressions
   */
  snapshot(): Record<string, unknown> {
    const view: Record<string, unknown> = {}
    for (const [name, slot] of this.slots) {
      view[name] = slot.value
    }
    return view
  }
}

// ============================================================================
// Context
// ============================================================================

export interface ProgressInfo {
  stageName: string
  itemsProcessed: number
  totalItems?: number
  percentComplete: number
  message?: string
  timestamp: string
}

export interface PipelineContextInit {
  pipelineId: string
  pipelineName: string
  settings: PipelineSettings
  logger: Logger
  executionId?: string
}

export class PipelineContext {
  readonly executionId: string
  readonly pipelineId: string
  readonly pipelineName: string
  readonly startTime: string
  readonly settings: PipelineSettings
  readonly variables = new VariableStore()
  readonly logger: Logger
  private readonly _errors: ExecutionError[] = []
  private readonly _warnings: ExecutionWarning[] = []
  private readonly _stageResults: StageResult[] = []
  private readonly _stageStatuses = new Map<string, StageStatus>()
  private _lastProgress?: ProgressInfo

  constructor(init: PipelineContextInit) {
    this.executionId = init.executionId ?? uuidv4()
    this.pipelineId = init.pipelineId
    this.pipelineName = init.pipelineName
    this.settings = init.settings
    this.startTime = new Date().toISOString()
    this.logger = init.logger.child({ executionId: this.executionId, pipelineId: this.pipelineId })
  }

  get errors(): readonly ExecutionError[] {
    return this._errors
  }

  get warnings(): readonly ExecutionWarning[] {
    return this._warnings
  }

  get errorCount(): number {
    return this._errors.length
  }

  get hasErrors(): boolean {
    return this._errors.length > 0
  }

  get lastProgress(): ProgressInfo | undefined {
    return this._lastProgress
  }

  get stageResults(): readonly StageResult[] {
    return this._stageResults
  }

  /**
   * Status of every stage the run knows about, in declaration order
   */
  get stageStatuses(): Record<string, StageStatus> {
    return Object.fromEntries(this._stageStatuses)
  }

  setStageStatus(stageName: string, status: StageStatus): void {
    this._stageStatuses.set(stageName, status)
  }

  /**
   * Record a finished stage; its status becomes final and the running
   * statistics include it
   */
  recordStageResult(result: StageResult): void {
    this._stageResults.push(result)
    this._stageStatuses.set(result.stageName, result.status)
  }

  get statistics(): RunningStatistics {
    const { recordsProcessed, recordsFailed } = countRecords(this._stageResults)
    const stages: RunningStatistics['stages'] = {}
    let retries = 0
    for (const result of this._stageResults) {
      stages[result.stageName] = {
        status: result.status,
        durationMs: result.durationMs,
        recordsProcessed: result.recordsProcessed,
        recordsFailed: result.recordsFailed,
        attempts: result.attempts,
      }
      retries += Math.max(result.attempts - 1, 0)
    }

    return {
      recordsProcessed,
      recordsFailed,
      stagesExecuted: this._stageResults.filter(r => r.status === 'completed' || r.status === 'failed').length,
      stagesSkipped: this._stageResults.filter(r => r.status === 'skipped').length,
      stagesFailed: this._stageResults.filter(r => r.status === 'failed').length,
      retries,
      stages,
    }
  }

  addError(error: ExecutionError): void {
    this._errors.push(error)
    this.logger.error(
      { code: error.code, source: error.source, severity: error.severity, recordId: error.recordId },
      error.message
    )
  }

  addWarning(warning: ExecutionWarning): void {
    this._warnings.push(warning)
    this.logger.warn({ code: warning.code, source: warning.source }, warning.message)
  }

  reportProgress(stageName: string, itemsProcessed: number, totalItems?: number, message?: string): void {
    const percentComplete = totalItems && totalItems > 0
      ? Math.min((itemsProcessed / totalItems) * 100, 100)
      : 0

    this._lastProgress = {
      stageName,
      itemsProcessed,
      totalItems,
      percentComplete,
      message,
      timestamp: new Date().toISOString(),
    }
    this.logger.debug({ stage: stageName, itemsProcessed, totalItems, percentComplete }, message ?? 'Progress')
  }

  /**
   * Data exposed to stage condition expressions
   */
  toExpressionScope(): Record<string, unknown> {
    return {
      pipelineId: this.pipelineId,
      pipelineName: this.pipelineName,
      executionId: this.executionId,
      errorCount: this._errors.length,
      statistics: this.statistics,
      variables: this.variables.snapshot(),
    }
  }
}

/**
 * Records entering the pipeline: extract stage totals when any extract stage
 * ran, otherwise the busiest stage. Failed records are capped at that total.
 */
export function countRecords(stageResults: readonly StageResult[]): { recordsProcessed: number; recordsFailed: number } {
  const ran = stageResults.filter(r => r.status === 'completed' || r.status === 'failed')
  const extracts = ran.filter(r => r.stageType === 'extract')

  const recordsProcessed =
    extracts.length > 0
      ? extracts.reduce((sum, r) => sum + r.recordsProcessed, 0)
      : ran.reduce((max, r) => Math.max(max, r.recordsProcessed), 0)
  const failed = ran.reduce((sum, r) => sum + r.recordsFailed, 0)

  return { recordsProcessed, recordsFailed: Math.min(failed, recordsProcessed) }
}
