/**
 * Pipeline Builder - fluent construction of pipelines in code
 *
 *   const pipeline = PipelineBuilder.create('orders')
 *     .extract('read-orders', source)
 *     .transform('enrich', { rules })
 *     .load('write-orders', destination)
 *     .errorHandling({ stopOnError: true })
 *     .build()
 *
 * Stage order defaults to one past the highest order added so far.
 */

import type { DestinationAdapter, SourceAdapter } from '../adapters'
import type { DataMapper } from '../transformation/mapping/data-mapper'
import type { RuleEngine } from '../transformation/rules/rule-engine'
import type { FieldValidator } from '../transformation/validation/field-validators'
import type { DeepPartialSettings, ErrorHandlingPolicy, ParallelConfig, RetryConfig } from '../types'
import { CustomStage, ExtractStage, LoadStage, TransformStage, ValidateStage } from './builtin-stages'
import type { StageHandler } from './builtin-stages'
import { ConfigurationError } from './errors'
import { Pipeline } from './pipeline'
import type { Stage, StageOptions } from './stage-executor'

type StageExtras = Partial<Omit<StageOptions, 'name'>>

export class PipelineBuilder {
  private id?: string
  private _description?: string
  private readonly stages: Stage[] = []
  private readonly settings: DeepPartialSettings = {}

  private constructor(private readonly name: string) {}

  static create(name: string): PipelineBuilder {
    return new PipelineBuilder(name)
  }

  withId(id: string): this {
    this.id = id
    return this
  }

  description(description: string): this {
    this._description = description
    return this
  }

  errorHandling(policy: Partial<ErrorHandlingPolicy>): this {
    this.settings.errorHandling = { ...this.settings.errorHandling, ...policy }
    return this
  }

  retry(config: Partial<RetryConfig>): this {
    this.settings.retry = { ...this.settings.retry, ...config }
    return this
  }

  parallel(config: Partial<ParallelConfig>): this {
    this.settings.parallel = { ...this.settings.parallel, ...config }
    return this
  }

  extract(name: string, source: SourceAdapter, extras: StageExtras = {}): this {
    return this.addStage(new ExtractStage({ ...this.stageOptions(name, extras), source }))
  }

  transform(
    name: string,
    steps: { rules?: RuleEngine; mapper?: DataMapper },
    extras: StageExtras = {}
  ): this {
    return this.addStage(new TransformStage({ ...this.stageOptions(name, extras), ...steps }))
  }

  validate(name: string, validators: FieldValidator[], extras: StageExtras & { dropInvalid?: boolean } = {}): this {
    return this.addStage(
      new ValidateStage({ ...this.stageOptions(name, extras), validators, dropInvalid: extras.dropInvalid })
    )
  }

  load(name: string, destination: DestinationAdapter, extras: StageExtras = {}): this {
    return this.addStage(new LoadStage({ ...this.stageOptions(name, extras), destination }))
  }

  custom(name: string, handler: StageHandler, extras: StageExtras & { type?: Stage['type'] } = {}): this {
    return this.addStage(new CustomStage({ ...this.stageOptions(name, extras), handler, type: extras.type }))
  }

  addStage(stage: Stage): this {
    this.stages.push(stage)
    return this
  }

  /**
   * Build and validate; invalid pipelines raise ConfigurationError
   */
  build(): Pipeline {
    const pipeline = new Pipeline({
      id: this.id,
      name: this.name,
      description: this._description,
      settings: this.settings,
      stages: this.stages,
    })

    const validation = pipeline.validate()
    if (!validation.isValid) {
      throw new ConfigurationError(`Pipeline "${this.name}" is invalid`, {
        issues: validation.errors.map(issue => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)),
      })
    }
    return pipeline
  }

  private stageOptions(name: string, extras: StageExtras): StageOptions {
    const nextOrder = this.stages.reduce((max, stage) => Math.max(max, stage.order + 1), 0)
    return {
      name,
      order: extras.order ?? nextOrder,
      enabled: extras.enabled,
      description: extras.description,
      condition: extras.condition,
      independent: extras.independent,
      variables: extras.variables,
      retry: extras.retry,
    }
  }
}
