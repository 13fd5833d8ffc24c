/**
 * Pipeline error taxonomy
 *
 * ConfigurationError   fatal, raised before any stage runs, never retried
 * TransientAdapterError retryable adapter failure (timeouts, throttling)
 * FatalAdapterError    non-retryable adapter failure; also the fallback for unknown errors
 * ValidationError      per-record, non-fatal by default
 * RuleActionError      per-record, isolated to the record
 * MappingError         per-record, isolated to the record
 * CancellationError    cooperative abort
 * ConcurrencyLimitError execution refused, too many runs in flight
 */

import type { ErrorCode, ErrorSeverity, ExecutionError } from '../types'

export class PipelineError extends Error {
  public readonly code: ErrorCode
  public readonly severity: ErrorSeverity

  constructor(message: string, code: ErrorCode, severity: ErrorSeverity, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PipelineError'
    this.code = code
    this.severity = severity
  }
}

export class ConfigurationError extends PipelineError {
  public readonly details?: {
    path?: string
    issues?: string[]
  }

  constructor(message: string, details?: ConfigurationError['details']) {
    super(message, 'CONFIGURATION_ERROR', 'critical')
    this.name = 'ConfigurationError'
    this.details = details
  }
}

export class TransientAdapterError extends PipelineError {
  constructor(message: string, public readonly adapter?: string, options?: { cause?: unknown }) {
    super(message, 'TRANSIENT_ADAPTER_ERROR', 'high', options)
    this.name = 'TransientAdapterError'
  }
}

export class FatalAdapterError extends PipelineError {
  constructor(message: string, public readonly adapter?: string, options?: { cause?: unknown }) {
    super(message, 'FATAL_ADAPTER_ERROR', 'error', options)
    this.name = 'FatalAdapterError'
  }
}

export class ValidationError extends PipelineError {
  constructor(message: string, public readonly field?: string) {
    super(message, 'VALIDATION_ERROR', 'medium')
    this.name = 'ValidationError'
  }
}

export class RuleActionError extends PipelineError {
  constructor(message: string, public readonly ruleName: string, options?: { cause?: unknown }) {
    super(message, 'RULE_ACTION_ERROR', 'medium', options)
    this.name = 'RuleActionError'
  }
}

export class MappingError extends PipelineError {
  constructor(message: string, public readonly destField: string, options?: { cause?: unknown }) {
    super(message, 'MAPPING_ERROR', 'medium', options)
    this.name = 'MappingError'
  }
}

export class CancellationError extends PipelineError {
  constructor(message = 'Execution was cancelled') {
    super(message, 'CANCELLED', 'high')
    this.name = 'CancellationError'
  }
}

export class ConcurrencyLimitError extends PipelineError {
  constructor(public readonly limit: number) {
    super(`Concurrent execution limit of ${limit} reached`, 'CONCURRENCY_LIMIT', 'high')
    this.name = 'ConcurrencyLimitError'
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}

/**
 * Anything that is not a PipelineError is treated as a fatal adapter failure
 */
export function normalizeError(error: unknown): PipelineError {
  if (error instanceof PipelineError) return error
  return new FatalAdapterError(errorMessage(error), undefined, { cause: error })
}

export function toExecutionError(
  error: unknown,
  source: string,
  extra?: { stageName?: string; recordId?: string }
): ExecutionError {
  const normalized = normalizeError(error)
  return {
    code: normalized.code,
    message: normalized.message,
    source,
    severity: normalized.severity,
    timestamp: new Date().toISOString(),
    stageName: extra?.stageName,
    recordId: extra?.recordId,
    cause: normalized.cause,
  }
}

/**
 * Throws a CancellationError when the signal has been aborted
 */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancellationError()
  }
}

export function isCancellation(error: unknown, signal?: AbortSignal): boolean {
  if (error instanceof CancellationError) return true
  if (signal?.aborted) return true
  return error instanceof Error && error.name === 'AbortError'
}
