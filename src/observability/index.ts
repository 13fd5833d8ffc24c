import pino from 'pino'
import type { Logger, LoggerOptions } from 'pino'

/**
 * Observability - the process-wide pino logger and pipeline metrics
 *
 * Orchestrator, stages, rule engine and mapper log through child loggers
 * bound to pipelineId / executionId / stage. Metrics written by the
 * orchestrator:
 *
 *   pipeline.executions       counter  {pipeline}
 *   pipeline.active           gauge    runs in flight
 *   pipeline.duration         timing   {pipeline, status}
 *   pipeline.stage.retries    counter  {pipeline, stage}
 *   pipeline.stage.failures   counter  {pipeline, stage}
 *   pipeline.stage.duration   timing   {pipeline, stage}
 */

export type { Logger } from 'pino'

export type MetricLabels = Record<string, string>

export interface Metrics {
  increment(name: string, value?: number, labels?: MetricLabels): void
  gauge(name: string, value: number, labels?: MetricLabels): void
  timing(name: string, durationMs: number, labels?: MetricLabels): void
}

/**
 * Keeps everything in maps; timings accumulate as counters
 */
export class InMemoryMetrics implements Metrics {
  private readonly counters = new Map<string, number>()
  private readonly gauges = new Map<string, number>()

  increment(name: string, value = 1, labels?: MetricLabels): void {
    const key = metricKey(name, labels)
    this.counters.set(key, (this.counters.get(key) ?? 0) + value)
  }

  gauge(name: string, value: number, labels?: MetricLabels): void {
    this.gauges.set(metricKey(name, labels), value)
  }

  timing(name: string, durationMs: number, labels?: MetricLabels): void {
    this.increment(name, durationMs, labels)
  }

  getCounter(name: string, labels?: MetricLabels): number {
    return this.counters.get(metricKey(name, labels)) ?? 0
  }

  getGauge(name: string, labels?: MetricLabels): number {
    return this.gauges.get(metricKey(name, labels)) ?? 0
  }

  reset(): void {
    this.counters.clear()
    this.gauges.clear()
  }
}

/**
 * name{a=1,b=2} with labels sorted by key
 */
function metricKey(name: string, labels?: MetricLabels): string {
  if (!labels) return name
  const rendered = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([key, value]) => `${key}=${value}`)
    .join(',')
  return `${name}{${rendered}}`
}

// PIPEWRIGHT_LOG_LEVEL sets the level, PIPEWRIGHT_LOG_PRETTY=true switches to pino-pretty
function loggerOptions(env: NodeJS.ProcessEnv): LoggerOptions {
  const options: LoggerOptions = { name: 'pipewright', level: env.PIPEWRIGHT_LOG_LEVEL ?? 'info' }
  if (env.PIPEWRIGHT_LOG_PRETTY === 'true') {
    options.transport = {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'HH:MM:ss', ignore: 'pid,hostname' },
    }
  }
  return options
}

export class Observability {
  private static instance: Observability | undefined

  readonly logger: Logger
  readonly metrics = new InMemoryMetrics()

  private constructor() {
    this.logger = pino(loggerOptions(process.env))
  }

  static getInstance(): Observability {
    if (!Observability.instance) {
      Observability.instance = new Observability()
    }
    return Observability.instance
  }

  createChildLogger(bindings: Record<string, unknown>): Logger {
    return this.logger.child(bindings)
  }
}

export const obs = Observability.getInstance()
export const logger = obs.logger
export const metrics = obs.metrics
