/**
 * Environment overrides
 *
 * Centralizes environment variable loading and provides fail-fast validation.
 * Use this instead of directly accessing process.env throughout the codebase.
 *
 *   PIPEWRIGHT_LOG_LEVEL          logging.level
 *   PIPEWRIGHT_MAX_ERRORS         pipeline.settings.errorHandling.maxErrors
 *   PIPEWRIGHT_STOP_ON_ERROR      pipeline.settings.errorHandling.stopOnError
 *   PIPEWRIGHT_EVENT_TIMEOUT_MS   orchestrator.eventTimeoutMs
 */

import { z } from 'zod'
import { ConfigurationError } from '../pipelines/errors'
import { LoggingConfigSchema, type PipelineConfig } from './schema'

const BooleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes')

const EnvironmentSchema = z.object({
  PIPEWRIGHT_LOG_LEVEL: LoggingConfigSchema.shape.level.removeDefault().optional(),
  PIPEWRIGHT_MAX_ERRORS: z.coerce.number().int().min(0).optional(),
  PIPEWRIGHT_STOP_ON_ERROR: BooleanFlag.optional(),
  PIPEWRIGHT_EVENT_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
})

export interface EnvironmentOverrides {
  logLevel?: PipelineConfig['logging']['level']
  maxErrors?: number
  stopOnError?: boolean
  eventTimeoutMs?: number
}

/**
 * Read overrides from the environment
 * @throws ConfigurationError when a variable is set to an invalid value
 */
export function loadEnvironmentOverrides(env: NodeJS.ProcessEnv = process.env): EnvironmentOverrides {
  // Blank variables count as unset
  const present = Object.fromEntries(
    Object.keys(EnvironmentSchema.shape)
      .map(key => [key, env[key]?.trim()] as const)
      .filter(([, value]) => value !== undefined && value !== '')
  )

  const result = EnvironmentSchema.safeParse(present)
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(`Invalid environment configuration:\n  - ${issues.join('\n  - ')}`, { issues })
  }

  return {
    logLevel: result.data.PIPEWRIGHT_LOG_LEVEL,
    maxErrors: result.data.PIPEWRIGHT_MAX_ERRORS,
    stopOnError: result.data.PIPEWRIGHT_STOP_ON_ERROR,
    eventTimeoutMs: result.data.PIPEWRIGHT_EVENT_TIMEOUT_MS,
  }
}

/**
 * Environment wins over file values; returns a new config
 */
export function applyEnvironmentOverrides(config: PipelineConfig, overrides: EnvironmentOverrides): PipelineConfig {
  const { errorHandling } = config.pipeline.settings
  return {
    ...config,
    pipeline: {
      ...config.pipeline,
      settings: {
        ...config.pipeline.settings,
        errorHandling: {
          ...errorHandling,
          maxErrors: overrides.maxErrors ?? errorHandling.maxErrors,
          stopOnError: overrides.stopOnError ?? errorHandling.stopOnError,
        },
      },
    },
    orchestrator: {
      ...config.orchestrator,
      eventTimeoutMs: overrides.eventTimeoutMs ?? config.orchestrator.eventTimeoutMs,
    },
    logging: {
      ...config.logging,
      level: overrides.logLevel ?? config.logging.level,
    },
  }
}
