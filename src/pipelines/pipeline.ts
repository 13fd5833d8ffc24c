/**
 * Pipeline - identity, settings and an ordered list of stages
 *
 * Supplied fully formed by the builder or the config factory; the
 * orchestrator only reads it.
 */

import { v4 as uuidv4 } from 'uuid'
import type { DeepPartialSettings, PipelineSettings, ValidationResult } from '../types'
import { addValidationError, createValidationResult, resolveSettings } from '../types'
import type { Stage } from './stage-executor'

export interface PipelineOptions {
  id?: string
  name: string
  description?: string
  settings?: DeepPartialSettings
  stages?: Stage[]
}

export class Pipeline {
  readonly id: string
  name: string
  description: string
  settings: PipelineSettings
  readonly createdAt: string
  private _stages: Stage[] = []

  constructor(options: PipelineOptions) {
    this.id = options.id ?? uuidv4()
    this.name = options.name
    this.description = options.description ?? ''
    this.settings = resolveSettings(options.settings)
    this.createdAt = new Date().toISOString()
    for (const stage of options.stages ?? []) {
      this.addStage(stage)
    }
  }

  /**
   * Stages in ascending order
   */
  get stages(): readonly Stage[] {
    return this._stages
  }

  addStage(stage: Stage): this {
    this._stages.push(stage)
    this._stages.sort((a, b) => a.order - b.order)
    return this
  }

  removeStage(name: string): boolean {
    const before = this._stages.length
    this._stages = this._stages.filter(stage => stage.name !== name)
    return this._stages.length !== before
  }

  getStage(name: string): Stage | undefined {
    return this._stages.find(stage => stage.name === name)
  }

  /**
   * Structural checks run by the orchestrator before any stage executes
   */
  validate(): ValidationResult {
    const result = createValidationResult()

    if (!this.name || this.name.trim() === '') {
      addValidationError(result, 'Pipeline name is required', 'name')
    }
    if (this._stages.length === 0) {
      addValidationError(result, 'Pipeline must have at least one stage', 'stages')
      return result
    }

    const orders = new Set<number>()
    const names = new Set<string>()
    for (const stage of this._stages) {
      const stageResult = stage.validate()
      for (const issue of stageResult.errors) {
        addValidationError(result, issue.message, `stages.${stage.name}${issue.path ? `.${issue.path}` : ''}`)
      }
      result.warnings.push(...stageResult.warnings)

      if (orders.has(stage.order)) {
        addValidationError(result, `Duplicate stage order ${stage.order} (stage "${stage.name}")`, 'stages')
      }
      orders.add(stage.order)

      if (names.has(stage.name)) {
        result.warnings.push({ message: `Duplicate stage name "${stage.name}"`, path: 'stages' })
      }
      names.add(stage.name)
    }

    if (this._stages.every(stage => !stage.enabled)) {
      result.warnings.push({ message: 'All stages are disabled', path: 'stages' })
    }

    const { errorHandling, retry, parallel } = this.settings
    if (errorHandling.maxErrors < 0) {
      addValidationError(result, 'errorHandling.maxErrors must not be negative', 'settings.errorHandling.maxErrors')
    }
    if (retry.maxAttempts < 0 || retry.delayMs < 0 || retry.maxDelayMs < 0) {
      addValidationError(result, 'retry values must not be negative', 'settings.retry')
    }
    if (parallel.maxDegreeOfParallelism < 1) {
      addValidationError(result, 'parallel.maxDegreeOfParallelism must be at least 1', 'settings.parallel')
    }

    return result
  }

  toString(): string {
    return `Pipeline[${this.name}, stages=${this._stages.length}]`
  }
}
