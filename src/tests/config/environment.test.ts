import { describe, it, expect } from 'vitest'
import { applyEnvironmentOverrides, loadEnvironmentOverrides } from '../../config/environment'
import { parsePipelineConfig } from '../../config/loader'
import { ConfigurationError } from '../../pipelines/errors'

const baseConfig = () =>
  parsePipelineConfig(`
pipeline:
  name: env
  settings:
    errorHandling:
      maxErrors: 50
  stages:
    - { name: hook, type: custom, order: 0, handler: audit }
`)

describe('environment overrides', () => {
  it('should read and coerce every variable', () => {
    expect(
      loadEnvironmentOverrides({
        PIPEWRIGHT_LOG_LEVEL: 'debug',
        PIPEWRIGHT_MAX_ERRORS: '5',
        PIPEWRIGHT_STOP_ON_ERROR: 'yes',
        PIPEWRIGHT_EVENT_TIMEOUT_MS: ' 250 ',
      })
    ).toEqual({ logLevel: 'debug', maxErrors: 5, stopOnError: true, eventTimeoutMs: 250 })
  })

  it('should treat unset and blank variables as absent', () => {
    expect(loadEnvironmentOverrides({ PIPEWRIGHT_MAX_ERRORS: '   ', UNRELATED: 'x' })).toEqual({
      logLevel: undefined,
      maxErrors: undefined,
      stopOnError: undefined,
      eventTimeoutMs: undefined,
    })
  })

  it('should parse boolean spellings', () => {
    expect(loadEnvironmentOverrides({ PIPEWRIGHT_STOP_ON_ERROR: '0' }).stopOnError).toBe(false)
    expect(loadEnvironmentOverrides({ PIPEWRIGHT_STOP_ON_ERROR: 'true' }).stopOnError).toBe(true)
  })

  it('should fail fast on invalid values', () => {
    expect(() => loadEnvironmentOverrides({ PIPEWRIGHT_MAX_ERRORS: 'many' })).toThrow(ConfigurationError)
    expect(() => loadEnvironmentOverrides({ PIPEWRIGHT_LOG_LEVEL: 'loud' })).toThrow('Invalid environment configuration')
    expect(() => loadEnvironmentOverrides({ PIPEWRIGHT_STOP_ON_ERROR: 'sometimes' })).toThrow(ConfigurationError)
  })

  it('should override file values without mutating the config', () => {
    const config = baseConfig()

    const merged = applyEnvironmentOverrides(config, { maxErrors: 3, logLevel: 'error', eventTimeoutMs: 100 })

    expect(merged.pipeline.settings.errorHandling).toEqual({ stopOnError: false, maxErrors: 3, continueOnStageFailure: true })
    expect(merged.logging.level).toBe('error')
    expect(merged.orchestrator).toEqual({ eventTimeoutMs: 100, historyLimit: 100, maxConcurrentExecutions: 10 })
    expect(config.pipeline.settings.errorHandling.maxErrors).toBe(50)
    expect(config.logging.level).toBe('info')
  })

  it('should keep file values when nothing is overridden', () => {
    const config = baseConfig()
    expect(applyEnvironmentOverrides(config, {})).toEqual(config)
  })
})
