/**
 * Built-in stages
 *
 * - ExtractStage: source adapter -> records variable
 * - TransformStage: records -> rule engine -> data mapper -> records
 * - ValidateStage: field validators, optionally dropping invalid records
 * - LoadStage: records -> destination adapter
 * - CustomStage: user-supplied handler
 */

import type { DestinationAdapter, SourceAdapter } from '../adapters'
import { toAsyncIterable } from '../adapters'
import type { DataRecord } from '../records'
import type { DataMapper } from '../transformation/mapping/data-mapper'
import type { RuleEngine } from '../transformation/rules/rule-engine'
import type { FieldValidator } from '../transformation/validation/field-validators'
import type { ExecutionError, StageOutcome, StageType, ValidationResult } from '../types'
import { addValidationError } from '../types'
import { ValidationError, throwIfAborted } from './errors'
import type { PipelineContext, VariableKey } from './pipeline-context'
import { RECORDS } from './pipeline-context'
import type { StageOptions } from './stage-executor'
import { PipelineStage } from './stage-executor'

type RecordsKey = VariableKey<DataRecord[]>

/**
 * Extract Stage - drains a source adapter into a variable
 */
export class ExtractStage extends PipelineStage {
  readonly type = 'extract'
  private readonly source: SourceAdapter
  private readonly output: RecordsKey

  constructor(options: StageOptions & { source: SourceAdapter; output?: RecordsKey }) {
    super(options)
    this.source = options.source
    this.output = options.output ?? RECORDS
  }

  async run(context: PipelineContext, signal: AbortSignal): Promise<StageOutcome> {
    const records: DataRecord[] = []
    for await (const record of this.source.read(signal)) {
      records.push(record)
      if (records.length % this.source.config.batchSize === 0) {
        throwIfAborted(signal)
        context.reportProgress(this.name, records.length)
      }
    }

    context.variables.set(this.output, records, this.name)
    context.reportProgress(this.name, records.length, records.length, 'Extraction complete')

    return {
      isSuccess: true,
      recordsProcessed: records.length,
      recordsSuccessful: records.length,
      recordsFailed: 0,
      metadata: { connectorType: this.source.config.connectorType, output: this.output.name },
    }
  }
}

/**
 * Transform Stage - routes records through rules, then mappings
 *
 * Per-record rule and mapping failures do not fail the stage; they are
 * reported as stage errors and counted as failed records.
 */
export class TransformStage extends PipelineStage {
  readonly type = 'transform'
  private readonly rules?: RuleEngine
  private readonly mapper?: DataMapper
  private readonly input: RecordsKey
  private readonly output: RecordsKey

  constructor(
    options: StageOptions & { rules?: RuleEngine; mapper?: DataMapper; input?: RecordsKey; output?: RecordsKey }
  ) {
    super(options)
    this.rules = options.rules
    this.mapper = options.mapper
    this.input = options.input ?? RECORDS
    this.output = options.output ?? this.input
  }

  validate(): ValidationResult {
    const result = super.validate()
    if (!this.rules && !this.mapper) {
      addValidationError(result, `Transform stage "${this.name}" needs a rule engine or a data mapper`, 'transform')
    }
    if (this.mapper) {
      result.warnings.push(...this.mapper.validate().warnings)
    }
    return result
  }

  async run(context: PipelineContext, signal: AbortSignal): Promise<StageOutcome> {
    const input = context.variables.get(this.input)
    if (input === undefined) {
      return {
        isSuccess: true,
        recordsProcessed: 0,
        warnings: [this.warning(`No records found in variable "${this.input.name}"`, 'NO_INPUT')],
      }
    }

    const errorsBefore = new Map(input.map(record => [record.id, record.errors.length]))

    let records = input
    if (this.rules) {
      records = await this.rules.process(records, signal)
    }
    if (this.mapper) {
      records = await this.mapper.map(records, signal)
    }

    const errors: ExecutionError[] = []
    let failed = 0
    for (const record of records) {
      const recordErrors = this.recordErrors(record, errorsBefore.get(record.id) ?? 0)
      if (recordErrors.length > 0) {
        failed++
        errors.push(...recordErrors)
      }
    }

    context.variables.set(this.output, records, this.name)

    return {
      isSuccess: true,
      recordsProcessed: input.length,
      recordsSuccessful: input.length - failed,
      recordsFailed: failed,
      errors,
      metadata: {
        recordsOut: records.length,
        recordsSkipped: input.length - records.length,
        rules: this.rules?.getStatistics().lastRun,
        mapping: this.mapper?.getStatistics().lastRun,
      },
    }
  }
}

/**
 * Validate Stage - applies field validators to each record
 */
export class ValidateStage extends PipelineStage {
  readonly type = 'validate'
  private readonly validators: FieldValidator[]
  private readonly dropInvalid: boolean
  private readonly input: RecordsKey
  private readonly output: RecordsKey

  constructor(
    options: StageOptions & {
      validators: FieldValidator[]
      dropInvalid?: boolean
      input?: RecordsKey
      output?: RecordsKey
    }
  ) {
    super(options)
    this.validators = options.validators
    this.dropInvalid = options.dropInvalid ?? false
    this.input = options.input ?? RECORDS
    this.output = options.output ?? this.input
  }

  async run(context: PipelineContext, signal: AbortSignal): Promise<StageOutcome> {
    const records = context.variables.get(this.input) ?? []
    const valid: DataRecord[] = []
    const invalid: DataRecord[] = []
    const errors: ExecutionError[] = []

    for (const record of records) {
      throwIfAborted(signal)
      let recordValid = true
      for (const validator of this.validators) {
        const message = validator.check(record.get(validator.field), record)
        if (message === undefined) continue

        recordValid = false
        const failure = new ValidationError(`${validator.field}: ${message}`, validator.field)
        record.addError({
          code: failure.code,
          message: failure.message,
          source: `Validator: ${validator.name}`,
          severity: failure.severity,
          field: validator.field,
        })
        errors.push(this.error(failure, record.id))
      }
      if (recordValid) {
        valid.push(record)
      } else {
        invalid.push(record)
      }
    }

    context.variables.set(this.output, this.dropInvalid ? valid : records, this.name)

    return {
      isSuccess: true,
      recordsProcessed: records.length,
      recordsSuccessful: valid.length,
      recordsFailed: invalid.length,
      errors,
      metadata: { dropped: this.dropInvalid ? invalid.length : 0, validators: this.validators.length },
    }
  }
}

/**
 * Load Stage - writes records to a destination adapter
 */
export class LoadStage extends PipelineStage {
  readonly type = 'load'
  private readonly destination: DestinationAdapter
  private readonly input: RecordsKey

  constructor(options: StageOptions & { destination: DestinationAdapter; input?: RecordsKey }) {
    super(options)
    this.destination = options.destination
    this.input = options.input ?? RECORDS
  }

  async run(context: PipelineContext, signal: AbortSignal): Promise<StageOutcome> {
    const records = context.variables.get(this.input) ?? []
    const result = await this.destination.write(toAsyncIterable(records), signal)
    context.reportProgress(this.name, result.written, records.length, 'Load complete')

    const errors = result.failures.map((failure): ExecutionError => ({
      code: 'FATAL_ADAPTER_ERROR',
      message: failure.message,
      source: this.errorSource,
      severity: 'medium',
      timestamp: new Date().toISOString(),
      stageName: this.name,
      recordId: failure.recordId,
    }))

    return {
      isSuccess: true,
      recordsProcessed: records.length,
      recordsSuccessful: result.written,
      recordsFailed: result.failed,
      errors,
      metadata: { connectorType: this.destination.config.connectorType },
    }
  }
}

export type StageHandler = (context: PipelineContext, signal: AbortSignal) => Promise<StageOutcome> | StageOutcome

/**
 * Custom Stage - wraps a user function. `type` defaults to custom but may
 * be any stage type, so hand-written extract or load logic is reported as such.
 */
export class CustomStage extends PipelineStage {
  readonly type: StageType
  private readonly handler: StageHandler

  constructor(options: StageOptions & { handler: StageHandler; type?: StageType }) {
    super(options)
    this.type = options.type ?? 'custom'
    this.handler = options.handler
  }

  async run(context: PipelineContext, signal: AbortSignal): Promise<StageOutcome> {
    return this.handler(context, signal)
  }
}
