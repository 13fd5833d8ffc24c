/**
 * Pipeline Orchestrator - drives one pipeline's stages against one context
 *
 * Sequencing, retry of transient failures, the stopOnError / maxErrors /
 * errorThreshold / continueOnStageFailure policy, optional parallel batches
 * of independent stages, cooperative cancellation, lifecycle events and
 * result aggregation.
 */

import type { Logger } from 'pino'
import { logger as rootLogger, metrics as rootMetrics } from '../observability'
import type { Metrics } from '../observability'
import { RetryHandler } from '../runtime/retry-handler'
import { runBounded, withTimeout } from '../runtime/resilience'
import type {
  ExecutionError,
  ExecutionStatistics,
  PipelineExecutionResult,
  PipelineStatus,
  RetryConfig,
  StageResult,
  StageStatus,
} from '../types'
import { DEFAULT_RETRY_CONFIG } from '../types'
import { ConcurrencyLimitError, ConfigurationError, errorMessage, isCancellation, toExecutionError } from './errors'
import type { Pipeline } from './pipeline'
import { PipelineContext } from './pipeline-context'
import type { PipelineEventPublisher, PipelineEventType } from './pipeline-events'
import { createPipelineEvent } from './pipeline-events'
import type { Stage } from './stage-executor'
import { evaluateStageCondition } from './stage-executor'

export interface OrchestratorOptions {
  logger?: Logger
  metrics?: Metrics
  publisher?: PipelineEventPublisher
  // Upper bound on waiting for a publisher to accept an event
  eventTimeoutMs?: number
  historyLimit?: number
  // Executions beyond this are rejected with ConcurrencyLimitError, never queued
  maxConcurrentExecutions?: number
  // Retry backoff hooks, mainly for tests
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  random?: () => number
}

export interface ExecuteOptions {
  signal?: AbortSignal
}

export interface ActiveExecutionInfo {
  executionId: string
  pipelineId: string
  pipelineName: string
  startTime: string
  currentStages: string[]
  stages: Record<string, StageStatus>
}

interface ActiveExecution {
  context: PipelineContext
  controller: AbortController
  currentStages: Set<string>
}

interface RunState {
  aborted: boolean
  cancelled: boolean
  unrecovered: boolean
}

export class PipelineOrchestrator {
  private readonly logger: Logger
  private readonly metrics: Metrics
  private readonly publisher?: PipelineEventPublisher
  private readonly eventTimeoutMs: number
  private readonly historyLimit: number
  private readonly maxConcurrentExecutions: number
  private readonly retryHandler: RetryHandler
  private readonly active = new Map<string, ActiveExecution>()
  private history: PipelineExecutionResult[] = []

  constructor(options: OrchestratorOptions = {}) {
    this.logger = options.logger ?? rootLogger.child({ component: 'orchestrator' })
    this.metrics = options.metrics ?? rootMetrics
    this.publisher = options.publisher
    this.eventTimeoutMs = options.eventTimeoutMs ?? 5000
    this.historyLimit = options.historyLimit ?? 100
    this.maxConcurrentExecutions = options.maxConcurrentExecutions ?? 10
    this.retryHandler = new RetryHandler(DEFAULT_RETRY_CONFIG, {
      logger: this.logger,
      metrics: this.metrics,
      sleep: options.sleep,
      random: options.random,
    })
  }

  /**
   * Fresh execution context: new execution id, start time, empty variables
   */
  createContext(pipeline: Pipeline): PipelineContext {
    return new PipelineContext({
      pipelineId: pipeline.id,
      pipelineName: pipeline.name,
      settings: pipeline.settings,
      logger: this.logger,
    })
  }

  /**
   * Execute a pipeline. Never throws for stage failures; the outcome is in
   * the returned result.
   * @throws ConcurrencyLimitError when maxConcurrentExecutions runs are in flight
   */
  async executePipeline(
    pipeline: Pipeline,
    context: PipelineContext = this.createContext(pipeline),
    options: ExecuteOptions = {}
  ): Promise<PipelineExecutionResult> {
    if (this.active.size >= this.maxConcurrentExecutions) {
      this.logger.warn(
        { pipeline: pipeline.name, limit: this.maxConcurrentExecutions },
        'Execution rejected; concurrency limit reached'
      )
      throw new ConcurrencyLimitError(this.maxConcurrentExecutions)
    }

    const controller = new AbortController()
    const forwardAbort = (): void => controller.abort()
    if (options.signal?.aborted) {
      controller.abort()
    } else {
      options.signal?.addEventListener('abort', forwardAbort, { once: true })
    }

    const execution: ActiveExecution = { context, controller, currentStages: new Set() }
    this.active.set(context.executionId, execution)
    this.metrics.gauge('pipeline.active', this.active.size)
    const started = Date.now()

    try {
      context.logger.info(
        { pipeline: pipeline.name, stages: pipeline.stages.length },
        'Pipeline execution started'
      )
      this.metrics.increment('pipeline.executions', 1, { pipeline: pipeline.name })
      await this.publish('pipeline.started', context, { pipelineName: pipeline.name, stageCount: pipeline.stages.length })

      const state: RunState = { aborted: false, cancelled: false, unrecovered: false }

      const validation = pipeline.validate()
      if (!validation.isValid) {
        const issues = validation.errors.map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
        const error = new ConfigurationError(`Pipeline "${pipeline.name}" is invalid: ${issues.join('; ')}`, { issues })
        context.addError(toExecutionError(error, `Pipeline: ${pipeline.name}`))
        state.aborted = true
      } else {
        for (const warning of validation.warnings) {
          context.addWarning({
            code: 'PIPELINE_VALIDATION',
            message: warning.message,
            source: `Pipeline: ${pipeline.name}`,
            timestamp: new Date().toISOString(),
          })
        }
        await this.runStages(pipeline, context, controller.signal, execution, state)
      }

      const result = this.buildResult(pipeline, context, state, started)
      this.recordHistory(result)
      this.metrics.timing('pipeline.duration', result.durationMs, { pipeline: pipeline.name, status: result.status })

      const logFields = {
        status: result.status,
        durationMs: result.durationMs,
        recordsProcessed: result.recordsProcessed,
        errors: result.errors.length,
      }
      if (result.isSuccess) {
        context.logger.info(logFields, 'Pipeline execution completed')
        await this.publish('pipeline.completed', context, { status: result.status, statistics: result.statistics })
      } else {
        context.logger.error(logFields, 'Pipeline execution failed')
        await this.publish('pipeline.failed', context, {
          status: result.status,
          errors: result.errors.map(error => ({ code: error.code, message: error.message, source: error.source })),
        })
      }

      return result
    } finally {
      options.signal?.removeEventListener('abort', forwardAbort)
      this.active.delete(context.executionId)
      this.metrics.gauge('pipeline.active', this.active.size)
    }
  }

  /**
   * Request cancellation of a running execution
   */
  stopExecution(executionId: string): boolean {
    const execution = this.active.get(executionId)
    if (!execution) {
      return false
    }
    execution.context.logger.warn('Stop requested')
    execution.controller.abort()
    return true
  }

  getActiveExecutions(): ActiveExecutionInfo[] {
    return Array.from(this.active.values()).map(({ context, currentStages }) => ({
      executionId: context.executionId,
      pipelineId: context.pipelineId,
      pipelineName: context.pipelineName,
      startTime: context.startTime,
      currentStages: Array.from(currentStages),
      stages: context.stageStatuses,
    }))
  }

  /**
   * Most recent first
   */
  getExecutionHistory(pipelineId?: string, limit = 50): PipelineExecutionResult[] {
    return this.history
      .filter(result => !pipelineId || result.pipelineId === pipelineId)
      .slice(-limit)
      .reverse()
  }

  clearExecutionHistory(): void {
    this.history = []
  }

  private async runStages(
    pipeline: Pipeline,
    context: PipelineContext,
    signal: AbortSignal,
    execution: ActiveExecution,
    state: RunState
  ): Promise<void> {
    // All policy comes from the context
    const { errorHandling, parallel } = context.settings
    for (const stage of pipeline.stages) {
      context.setStageStatus(stage.name, 'ready')
    }

    for (const batch of this.schedule(pipeline.stages, parallel.enabled)) {
      if (signal.aborted) {
        state.cancelled = true
        break
      }

      const results =
        batch.length === 1
          ? [await this.runStage(batch[0], context, signal, execution)]
          : await runBounded(
              batch.map(stage => () => this.runStage(stage, context, signal, execution)),
              parallel.maxDegreeOfParallelism
            )

      for (const stageResult of results) {
        context.recordStageResult(stageResult)
        for (const warning of stageResult.warnings) {
          context.addWarning(warning)
        }
        for (const error of stageResult.errors) {
          context.addError(error)
        }
        await this.publish('pipeline.stage.completed', context, {
          stageName: stageResult.stageName,
          stageType: stageResult.stageType,
          status: stageResult.status,
          durationMs: stageResult.durationMs,
          recordsProcessed: stageResult.recordsProcessed,
          attempts: stageResult.attempts,
        })
      }

      if (results.some(result => result.status === 'cancelled')) {
        state.cancelled = true
        break
      }

      for (const stageResult of results) {
        if (stageResult.status !== 'failed') continue
        this.metrics.increment('pipeline.stage.failures', 1, { pipeline: pipeline.name, stage: stageResult.stageName })

        if (errorHandling.stopOnError) {
          context.logger.error({ stage: stageResult.stageName }, 'Stage failed and stopOnError is set; aborting')
          state.aborted = true
          break
        }
        if (errorHandling.continueOnStageFailure) {
          context.addWarning({
            code: 'STAGE_FAILURE_TOLERATED',
            message: `Stage "${stageResult.stageName}" failed and was tolerated: ${stageResult.errors
              .map(error => error.message)
              .join('; ')}`,
            source: `Stage: ${stageResult.stageName}`,
            timestamp: new Date().toISOString(),
            stageName: stageResult.stageName,
          })
        } else {
          state.unrecovered = true
        }
      }
      if (state.aborted) break

      const breach = this.thresholdBreach(context)
      if (breach) {
        context.logger.error({ errorCount: context.errorCount }, breach)
        context.addWarning({
          code: 'ERROR_THRESHOLD_EXCEEDED',
          message: breach,
          source: `Pipeline: ${pipeline.name}`,
          timestamp: new Date().toISOString(),
        })
        state.aborted = true
        break
      }
    }

    // A stage that ignored the signal may still have finished after cancellation
    if (signal.aborted) {
      state.cancelled = true
    }
  }

  /**
   * Group stages into batches. Sequential mode: one stage per batch. Parallel
   * mode: consecutive independent stages with disjoint variables share a batch.
   */
  private schedule(stages: readonly Stage[], parallel: boolean): Stage[][] {
    if (!parallel) {
      return stages.map(stage => [stage])
    }

    const batches: Stage[][] = []
    let current: Stage[] = []
    let claimed = new Set<string>()

    const flush = (): void => {
      if (current.length > 0) batches.push(current)
      current = []
      claimed = new Set()
    }

    for (const stage of stages) {
      if (!stage.independent) {
        flush()
        batches.push([stage])
        continue
      }
      if (stage.variables.some(name => claimed.has(name))) {
        flush()
      }
      current.push(stage)
      for (const name of stage.variables) claimed.add(name)
    }
    flush()

    return batches
  }

  /**
   * Run one stage with retries. Never throws; failures become a failed result.
   */
  private async runStage(
    stage: Stage,
    context: PipelineContext,
    signal: AbortSignal,
    execution: ActiveExecution
  ): Promise<StageResult> {
    const startTime = new Date()
    const stageLogger = context.logger.child({ stage: stage.name })

    const finish = (partial: Partial<StageResult> & Pick<StageResult, 'status'>): StageResult => {
      const endTime = new Date()
      return {
        stageName: stage.name,
        stageType: stage.type,
        order: stage.order,
        isSuccess: partial.status === 'completed' || partial.status === 'skipped',
        startTime: startTime.toISOString(),
        endTime: endTime.toISOString(),
        durationMs: endTime.getTime() - startTime.getTime(),
        recordsProcessed: 0,
        recordsSuccessful: 0,
        recordsFailed: 0,
        attempts: 0,
        errors: [],
        warnings: [],
        metadata: {},
        ...partial,
      }
    }

    if (!stage.enabled) {
      stageLogger.debug('Stage disabled, skipping')
      return finish({ status: 'skipped', metadata: { skipReason: 'disabled' } })
    }

    if (stage.condition !== undefined) {
      let shouldRun: boolean
      try {
        shouldRun = evaluateStageCondition(stage.condition, context)
      } catch (error) {
        stageLogger.error({ err: errorMessage(error) }, 'Stage condition failed')
        return finish({
          status: 'failed',
          errors: [toExecutionError(error, `Stage: ${stage.name}`, { stageName: stage.name })],
        })
      }
      if (!shouldRun) {
        stageLogger.info('Stage condition not met, skipping')
        return finish({ status: 'skipped', metadata: { skipReason: 'condition' } })
      }
    }

    const policy: RetryConfig = { ...context.settings.retry, ...stage.retry }
    let invocations = 0
    execution.currentStages.add(stage.name)
    context.setStageStatus(stage.name, 'running')
    stageLogger.info({ type: stage.type, order: stage.order }, 'Stage started')

    try {
      const { value: outcome } = await this.retryHandler.withRetry(
        async () => {
          invocations++
          return stage.run(context, signal)
        },
        policy,
        {
          signal,
          labels: { pipeline: context.pipelineName, stage: stage.name },
          onRetry: ({ attempt, delayMs, error }) => {
            this.metrics.increment('pipeline.stage.retries', 1, { pipeline: context.pipelineName, stage: stage.name })
            stageLogger.warn({ retry: attempt + 1, delayMs, err: errorMessage(error) }, 'Retrying stage')
          },
        }
      )

      const errors: ExecutionError[] = [...(outcome.errors ?? [])]
      if (!outcome.isSuccess && errors.length === 0) {
        errors.push({
          code: 'STAGE_FAILED',
          message: `Stage "${stage.name}" reported failure`,
          source: `Stage: ${stage.name}`,
          severity: 'error',
          timestamp: new Date().toISOString(),
          stageName: stage.name,
        })
      }

      const recordsFailed = outcome.recordsFailed ?? 0
      const result = finish({
        status: outcome.isSuccess ? 'completed' : 'failed',
        recordsProcessed: outcome.recordsProcessed,
        recordsSuccessful: outcome.recordsSuccessful ?? Math.max(outcome.recordsProcessed - recordsFailed, 0),
        recordsFailed,
        attempts: invocations,
        errors,
        warnings: [...(outcome.warnings ?? [])],
        metadata: { ...outcome.metadata },
      })
      this.metrics.timing('pipeline.stage.duration', result.durationMs, { pipeline: context.pipelineName, stage: stage.name })
      stageLogger.info(
        { status: result.status, durationMs: result.durationMs, recordsProcessed: result.recordsProcessed, attempts: invocations },
        'Stage finished'
      )
      return result
    } catch (error) {
      if (isCancellation(error, signal)) {
        stageLogger.warn('Stage cancelled')
        return finish({ status: 'cancelled', attempts: invocations })
      }

      stageLogger.error({ err: errorMessage(error), attempts: invocations }, 'Stage failed')
      return finish({
        status: 'failed',
        attempts: invocations,
        errors: [toExecutionError(error, `Stage: ${stage.name}`, { stageName: stage.name })],
      })
    } finally {
      execution.currentStages.delete(stage.name)
    }
  }

  private thresholdBreach(context: PipelineContext): string | undefined {
    const { maxErrors, errorThreshold } = context.settings.errorHandling
    if (context.errorCount > maxErrors) {
      return `Error count ${context.errorCount} exceeds maxErrors ${maxErrors}; aborting`
    }
    if (errorThreshold !== undefined) {
      const processed = context.statistics.recordsProcessed
      if (processed > 0 && context.errorCount / processed > errorThreshold) {
        return `Error rate ${(context.errorCount / processed).toFixed(3)} exceeds errorThreshold ${errorThreshold}; aborting`
      }
    }
    return undefined
  }

  private buildResult(
    pipeline: Pipeline,
    context: PipelineContext,
    state: RunState,
    started: number
  ): PipelineExecutionResult {
    const endTime = new Date()
    const durationMs = endTime.getTime() - started
    const running = context.statistics
    const { recordsProcessed, recordsFailed } = running

    let status: PipelineStatus = 'completed'
    if (state.cancelled) {
      status = 'cancelled'
    } else if (state.aborted || state.unrecovered) {
      status = 'failed'
    }

    const statistics: ExecutionStatistics = {
      totalRecords: recordsProcessed,
      successfulRecords: recordsProcessed - recordsFailed,
      failedRecords: recordsFailed,
      stagesExecuted: running.stagesExecuted,
      stagesSkipped: running.stagesSkipped,
      stagesFailed: running.stagesFailed,
      retries: running.retries,
      processingRate: durationMs > 0 ? recordsProcessed / (durationMs / 1000) : 0,
      stages: running.stages,
    }

    return {
      executionId: context.executionId,
      pipelineId: pipeline.id,
      pipelineName: pipeline.name,
      status,
      isSuccess: status === 'completed',
      startTime: context.startTime,
      endTime: endTime.toISOString(),
      durationMs,
      recordsProcessed,
      recordsSuccessful: recordsProcessed - recordsFailed,
      recordsFailed,
      stageResults: [...context.stageResults],
      errors: [...context.errors],
      warnings: [...context.warnings],
      statistics,
    }
  }

  private recordHistory(result: PipelineExecutionResult): void {
    this.history.push(result)
    if (this.history.length > this.historyLimit) {
      this.history.splice(0, this.history.length - this.historyLimit)
    }
  }

  private async publish(type: PipelineEventType, context: PipelineContext, payload: Record<string, unknown>): Promise<void> {
    if (!this.publisher) return
    const publisher = this.publisher
    const event = createPipelineEvent(type, context.pipelineId, context.executionId, payload)
    try {
      await withTimeout(() => publisher.publish(event), this.eventTimeoutMs, `Publishing ${type} timed out`)
    } catch (error) {
      context.logger.warn({ event: type, err: errorMessage(error) }, 'Failed to publish pipeline event')
    }
  }
}
