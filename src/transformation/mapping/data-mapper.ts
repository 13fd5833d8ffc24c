/**
 * Data Mapper - declarative field projection
 *
 * Output records contain only mapped fields. Within a record, mappings apply
 * in declaration order: direct field mappings, then constants, then
 * conditionals (which see everything mapped before them).
 *
 * A failing transform or conditional does not drop the record: the
 * destination is set to null and a MappingError is recorded on the output.
 */

import type { Logger } from 'pino'
import { DataRecord } from '../../records'
import { logger as rootLogger } from '../../observability'
import { ExpressionEvaluator } from '../../pipelines/expression-evaluator'
import { ConfigurationError, MappingError, errorMessage, throwIfAborted } from '../../pipelines/errors'
import type { ValidationResult } from '../../types'
import { addValidationError, createValidationResult } from '../../types'
import type { FieldTransform, TransformDefinition, TransformRegistry } from './field-transformations'
import { fieldTransforms } from './field-transformations'

export interface FieldMapping {
  kind: 'field'
  sourceField: string
  destField: string
  transform?: FieldTransform
  defaultValue?: unknown
  required?: boolean
}

export interface ConstantMapping {
  kind: 'constant'
  destField: string
  value: unknown
}

export interface ConditionalMapping {
  kind: 'conditional'
  destField: string
  compute: (mapped: DataRecord, source: DataRecord) => unknown
}

export type Mapping = FieldMapping | ConstantMapping | ConditionalMapping

export interface FieldMappingOptions {
  defaultValue?: unknown
  required?: boolean
}

/**
 * Config-friendly mapping descriptions (see fromDefinition)
 */
export type MappingDefinition =
  | {
      type: 'field'
      source: string
      target: string
      transforms?: Array<TransformDefinition | string>
      default?: unknown
      required?: boolean
    }
  | { type: 'constant'; target: string; value?: unknown }
  | {
      type: 'conditional'
      target: string
      // Evaluated over the mapped fields, with source fields under "_source"
      condition: string
      whenTrue?: unknown
      whenFalse?: unknown
    }

export interface DataMapperStatistics {
  totalMappings: number
  fieldMappings: number
  constantMappings: number
  conditionalMappings: number
  requiredMappings: number
  transformMappings: number
  lastRun?: {
    recordsIn: number
    recordsOut: number
    mappingErrors: number
    durationMs: number
  }
}

export class DataMapper {
  private readonly fieldMappings: FieldMapping[] = []
  private readonly constantMappings: ConstantMapping[] = []
  private readonly conditionalMappings: ConditionalMapping[] = []
  private lastRun?: DataMapperStatistics['lastRun']
  private readonly logger: Logger

  constructor(readonly name = 'mapper', logger?: Logger) {
    this.logger = logger ?? rootLogger.child({ component: 'data-mapper', mapper: name })
  }

  /**
   * Build a mapper from declarative definitions, resolving transforms by name
   */
  static fromDefinition(
    definitions: MappingDefinition[],
    options: { name?: string; logger?: Logger; transforms?: TransformRegistry } = {}
  ): DataMapper {
    const transforms = options.transforms ?? fieldTransforms
    const mapper = new DataMapper(options.name, options.logger)
    for (const definition of definitions) {
      switch (definition.type) {
        case 'field':
          mapper.addMapping(
            definition.source,
            definition.target,
            definition.transforms && definition.transforms.length > 0
              ? transforms.compose(definition.transforms)
              : undefined,
            { defaultValue: definition.default, required: definition.required }
          )
          break
        case 'constant':
          mapper.addConstantMapping(definition.target, definition.value ?? null)
          break
        case 'conditional': {
          ExpressionEvaluator.validate(definition.condition)
          const { condition, whenTrue, whenFalse } = definition
          mapper.addConditionalMapping(definition.target, (mapped, source) => {
            const scope = { ...mapped.toObject(), _source: source.toObject() }
            const chosen = ExpressionEvaluator.evaluate(condition, scope) ? whenTrue : whenFalse
            return typeof chosen === 'string' ? ExpressionEvaluator.resolve(chosen, scope) : chosen ?? null
          })
          break
        }
      }
    }
    return mapper
  }

  get mappings(): readonly Mapping[] {
    return [...this.fieldMappings, ...this.constantMappings, ...this.conditionalMappings]
  }

  addMapping(sourceField: string, destField: string, transform?: FieldTransform, options: FieldMappingOptions = {}): this {
    if (this.fieldMappings.some(mapping => mapping.sourceField === sourceField)) {
      throw new ConfigurationError(`Source field "${sourceField}" is already mapped in mapper "${this.name}"`)
    }
    this.fieldMappings.push({
      kind: 'field',
      sourceField,
      destField,
      transform,
      defaultValue: options.defaultValue,
      required: options.required,
    })
    return this
  }

  addConstantMapping(destField: string, value: unknown): this {
    this.constantMappings.push({ kind: 'constant', destField, value })
    return this
  }

  addConditionalMapping(destField: string, compute: ConditionalMapping['compute']): this {
    this.conditionalMappings.push({ kind: 'conditional', destField, compute })
    return this
  }

  /**
   * Remove every mapping writing to destField
   */
  removeMapping(destField: string): boolean {
    let removed = false
    for (const list of [this.fieldMappings, this.constantMappings, this.conditionalMappings]) {
      for (let i = list.length - 1; i >= 0; i--) {
        if (list[i].destField === destField) {
          list.splice(i, 1)
          removed = true
        }
      }
    }
    return removed
  }

  clearMappings(): void {
    this.fieldMappings.length = 0
    this.constantMappings.length = 0
    this.conditionalMappings.length = 0
  }

  async map(records: Iterable<DataRecord>, signal?: AbortSignal): Promise<DataRecord[]> {
    const started = Date.now()
    const output: DataRecord[] = []
    let mappingErrors = 0
    let recordsIn = 0

    for (const source of records) {
      throwIfAborted(signal)
      recordsIn++
      const mapped = this.mapRecord(source)
      mappingErrors += mapped.errors.length - source.errors.length
      output.push(mapped)
    }

    this.lastRun = { recordsIn, recordsOut: output.length, mappingErrors, durationMs: Date.now() - started }
    this.logger.debug({ ...this.lastRun }, 'Records mapped')
    return output
  }

  /**
   * Project one record; identity, origin and earlier errors carry over
   */
  mapRecord(source: DataRecord): DataRecord {
    const mapped = new DataRecord(undefined, { id: source.id, source: source.source, rowNumber: source.rowNumber })
    mapped.errors.push(...source.errors)
    for (const [key, value] of source.metadata) {
      mapped.metadata.set(key, value)
    }

    for (const mapping of this.fieldMappings) {
      if (!source.has(mapping.sourceField) || source.get(mapping.sourceField) === undefined) {
        if (mapping.required) {
          this.fail(mapped, mapping.destField, `Required source field "${mapping.sourceField}" is missing`)
        } else {
          mapped.set(mapping.destField, mapping.defaultValue ?? null)
        }
        continue
      }

      const value = source.get(mapping.sourceField)
      if (!mapping.transform) {
        mapped.set(mapping.destField, value)
        continue
      }
      try {
        mapped.set(mapping.destField, mapping.transform(value, source))
      } catch (error) {
        this.fail(mapped, mapping.destField, `Transform of "${mapping.sourceField}" failed: ${errorMessage(error)}`, error)
      }
    }

    for (const mapping of this.constantMappings) {
      mapped.set(mapping.destField, mapping.value)
    }

    for (const mapping of this.conditionalMappings) {
      try {
        mapped.set(mapping.destField, mapping.compute(mapped, source))
      } catch (error) {
        this.fail(mapped, mapping.destField, `Conditional mapping failed: ${errorMessage(error)}`, error)
      }
    }

    return mapped
  }

  private fail(record: DataRecord, destField: string, message: string, cause?: unknown): void {
    const error = new MappingError(message, destField, { cause })
    record.set(destField, null)
    record.addError({
      code: error.code,
      message: error.message,
      source: `Mapping: ${destField}`,
      severity: error.severity,
      field: destField,
    })
    this.logger.warn({ recordId: record.id, destField, err: message }, 'Mapping failed for record')
  }

  validate(): ValidationResult {
    const result = createValidationResult()
    const destinations = new Set<string>()

    for (const mapping of this.mappings) {
      if (!mapping.destField || mapping.destField.trim() === '') {
        addValidationError(result, 'Mapping destination field is required', 'destField')
        continue
      }
      if (mapping.kind === 'field' && mapping.sourceField.trim() === '') {
        addValidationError(result, `Mapping to "${mapping.destField}" has no source field`, 'sourceField')
      }
      if (destinations.has(mapping.destField)) {
        result.warnings.push({
          message: `Destination field "${mapping.destField}" is written by more than one mapping`,
          path: mapping.destField,
        })
      }
      destinations.add(mapping.destField)
    }

    if (destinations.size === 0) {
      result.warnings.push({ message: `Mapper "${this.name}" has no mappings; output records will be empty` })
    }

    return result
  }

  getStatistics(): DataMapperStatistics {
    return {
      totalMappings: this.fieldMappings.length + this.constantMappings.length + this.conditionalMappings.length,
      fieldMappings: this.fieldMappings.length,
      constantMappings: this.constantMappings.length,
      conditionalMappings: this.conditionalMappings.length,
      requiredMappings: this.fieldMappings.filter(mapping => mapping.required).length,
      transformMappings: this.fieldMappings.filter(mapping => mapping.transform !== undefined).length,
      lastRun: this.lastRun,
    }
  }
}
