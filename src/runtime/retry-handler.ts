import type { Logger } from 'pino'
import type { RetryConfig } from '../types'
import type { Metrics } from '../observability'
import { ConfigurationError, FatalAdapterError, TransientAdapterError, errorMessage, isCancellation } from '../pipelines/errors'
import { delay } from './resilience'

export interface RetryAttemptInfo {
  attempt: number // zero-based retry index
  delayMs: number
  error: unknown
}

export interface RetryOptions {
  signal?: AbortSignal
  onRetry?: (info: RetryAttemptInfo) => void
  labels?: Record<string, string>
}

export interface RetryOutcome<T> {
  value: T
  retries: number
}

/**
 * RetryHandler - retries transient failures with exponential backoff
 *
 * - delay * multiplier^attempt, capped at maxDelayMs
 * - optional uniform jitter in [0, delay), still capped at maxDelayMs
 * - only transient errors are retried; configuration errors never are
 */
export class RetryHandler {
  constructor(
    private defaultPolicy: RetryConfig,
    private options: {
      logger?: Logger
      metrics?: Metrics
      random?: () => number
      sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
    } = {}
  ) {}

  /**
   * Wait before retry number `attempt` (0 for the first retry)
   */
  calculateDelay(attempt: number, policy: RetryConfig = this.defaultPolicy): number {
    const baseDelay = policy.delayMs * Math.pow(policy.backoffMultiplier, attempt)
    const cappedDelay = Math.min(baseDelay, policy.maxDelayMs)

    if (!policy.jitter) {
      return cappedDelay
    }

    const random = this.options.random ?? Math.random
    const jitter = random() * policy.delayMs
    return Math.min(cappedDelay + jitter, policy.maxDelayMs)
  }

  /**
   * Transient when it is a TransientAdapterError or its message contains one
   * of the policy's retryable fragments
   */
  isRetryable(error: unknown, policy: RetryConfig = this.defaultPolicy): boolean {
    if (error instanceof ConfigurationError) {
      return false
    }
    if (error instanceof TransientAdapterError) {
      return true
    }
    if (!policy.retryableErrors || policy.retryableErrors.length === 0) {
      return false
    }

    const message = errorMessage(error).toLowerCase()
    return policy.retryableErrors.some(pattern => message.includes(pattern.toLowerCase()))
  }

  /**
   * Wrap an async operation with retry logic
   */
  async withRetry<T>(
    operation: (attempt: number) => Promise<T>,
    policy: RetryConfig = this.defaultPolicy,
    options: RetryOptions = {}
  ): Promise<RetryOutcome<T>> {
    const sleep = this.options.sleep ?? delay
    let retries = 0

    for (;;) {
      try {
        const value = await operation(retries)
        if (retries > 0) {
          this.options.metrics?.increment('retry.success', 1, options.labels)
        }
        return { value, retries }
      } catch (error) {
        if (isCancellation(error, options.signal) || !this.isRetryable(error, policy)) {
          throw error
        }

        if (retries >= policy.maxAttempts) {
          this.options.metrics?.increment('retry.exhausted', 1, options.labels)
          this.options.logger?.warn(
            { retries, maxAttempts: policy.maxAttempts, err: errorMessage(error) },
            'Retries exhausted, treating failure as fatal'
          )
          throw new RetryExhaustedError(error, retries)
        }

        const delayMs = this.calculateDelay(retries, policy)
        this.options.metrics?.increment('retry.scheduled', 1, options.labels)
        this.options.logger?.info(
          { attempt: retries + 1, delayMs, err: errorMessage(error) },
          'Transient failure, scheduling retry'
        )
        options.onRetry?.({ attempt: retries, delayMs, error })

        await sleep(delayMs, options.signal)
        retries++
      }
    }
  }
}

/**
 * Raised when a transient failure outlives its retry budget
 */
export class RetryExhaustedError extends FatalAdapterError {
  constructor(public readonly lastError: unknown, public readonly retries: number) {
    super(`${errorMessage(lastError)} (gave up after ${retries} retries)`, undefined, { cause: lastError })
    this.name = 'RetryExhaustedError'
  }
}
