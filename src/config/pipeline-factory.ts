/**
 * Pipeline Factory - validated definitions to runnable pipelines
 *
 * Adapters come from an AdapterRegistry, rules are compiled from their
 * declarative definitions, mappings and validators are resolved by name.
 * Custom stages reference handlers supplied by the caller.
 */

import type { Logger } from 'pino'
import { AdapterRegistry } from '../adapters'
import { Observability } from '../observability'
import type { Metrics } from '../observability'
import { CustomStage, ExtractStage, LoadStage, TransformStage, ValidateStage } from '../pipelines/builtin-stages'
import type { StageHandler } from '../pipelines/builtin-stages'
import { ConfigurationError } from '../pipelines/errors'
import { Pipeline } from '../pipelines/pipeline'
import { RECORDS, defineVariable } from '../pipelines/pipeline-context'
import type { VariableKey } from '../pipelines/pipeline-context'
import type { PipelineEventPublisher } from '../pipelines/pipeline-events'
import { PipelineOrchestrator } from '../pipelines/pipeline-orchestrator'
import type { Stage, StageOptions } from '../pipelines/stage-executor'
import type { DataRecord } from '../records'
import { DataMapper } from '../transformation/mapping/data-mapper'
import type { TransformRegistry } from '../transformation/mapping/field-transformations'
import { fieldTransforms } from '../transformation/mapping/field-transformations'
import { compileRule } from '../transformation/rules/rule-builder'
import { RuleEngine } from '../transformation/rules/rule-engine'
import { createValidator } from '../transformation/validation/field-validators'
import type { PipelineConfig, PipelineDefinition, StageDefinition } from './schema'

export interface PipelineFactoryOptions {
  adapters?: AdapterRegistry
  handlers?: Record<string, StageHandler>
  transforms?: TransformRegistry
  logger?: Logger
}

function recordsKey(name: string | undefined): VariableKey<DataRecord[]> {
  return name === undefined || name === RECORDS.name ? RECORDS : defineVariable<DataRecord[]>(name)
}

function baseOptions(definition: StageDefinition): StageOptions {
  return {
    name: definition.name,
    order: definition.order,
    enabled: definition.enabled,
    description: definition.description,
    condition: definition.condition,
    independent: definition.independent,
    variables: definition.variables,
    retry: definition.retry,
  }
}

/**
 * Build one stage from its definition
 * @throws ConfigurationError for unknown connectors, transforms or handlers
 */
export function createStage(definition: StageDefinition, options: PipelineFactoryOptions = {}): Stage {
  const adapters = options.adapters ?? new AdapterRegistry()
  const transforms = options.transforms ?? fieldTransforms

  switch (definition.type) {
    case 'extract':
      return new ExtractStage({
        ...baseOptions(definition),
        source: adapters.createSource(definition.adapter),
        output: recordsKey(definition.output),
      })

    case 'transform': {
      const rules = definition.rules?.length
        ? new RuleEngine(definition.rules.map(rule => compileRule(rule, transforms)), options.logger)
        : undefined
      const mapper = definition.mappings?.length
        ? DataMapper.fromDefinition(definition.mappings, { name: definition.name, logger: options.logger, transforms })
        : undefined
      return new TransformStage({
        ...baseOptions(definition),
        rules,
        mapper,
        input: recordsKey(definition.input),
        output: recordsKey(definition.output ?? definition.input),
      })
    }

    case 'validate':
      return new ValidateStage({
        ...baseOptions(definition),
        validators: definition.validators.map(createValidator),
        dropInvalid: definition.dropInvalid,
        input: recordsKey(definition.input),
        output: recordsKey(definition.output ?? definition.input),
      })

    case 'load':
      return new LoadStage({
        ...baseOptions(definition),
        destination: adapters.createDestination(definition.adapter),
        input: recordsKey(definition.input),
      })

    case 'custom': {
      const handler = options.handlers?.[definition.handler]
      if (!handler) {
        throw new ConfigurationError(
          `Unknown stage handler "${definition.handler}" for stage "${definition.name}". Available: ${Object.keys(
            options.handlers ?? {}
          ).join(', ')}`
        )
      }
      return new CustomStage({ ...baseOptions(definition), handler })
    }
  }
}

export function createPipeline(definition: PipelineDefinition, options: PipelineFactoryOptions = {}): Pipeline {
  const adapters = options.adapters ?? new AdapterRegistry()
  return new Pipeline({
    id: definition.id,
    name: definition.name,
    description: definition.description,
    settings: definition.settings,
    stages: definition.stages.map(stage => createStage(stage, { ...options, adapters })),
  })
}

/**
 * Orchestrator configured from the file's orchestrator and logging sections
 */
export function createOrchestrator(
  config: PipelineConfig,
  options: { publisher?: PipelineEventPublisher; metrics?: Metrics } = {}
): PipelineOrchestrator {
  const obs = Observability.getInstance()
  const logger = obs.createChildLogger({ component: 'orchestrator' })
  logger.level = config.logging.level

  return new PipelineOrchestrator({
    logger,
    metrics: options.metrics ?? obs.metrics,
    publisher: options.publisher,
    eventTimeoutMs: config.orchestrator.eventTimeoutMs,
    historyLimit: config.orchestrator.historyLimit,
    maxConcurrentExecutions: config.orchestrator.maxConcurrentExecutions,
  })
}
