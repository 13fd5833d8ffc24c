/**
 * Field validators for ValidateStage
 *
 * A validator returns undefined when the value passes, otherwise the
 * failure message.
 */

import type { DataRecord } from '../../records'
import { ConfigurationError } from '../../pipelines/errors'

export type ValueType = 'string' | 'number' | 'boolean' | 'date'

export type ValidatorDefinition =
  | { type: 'required'; field: string }
  | { type: 'type'; field: string; expected: ValueType }
  | { type: 'pattern'; field: string; pattern: string; message?: string }
  | { type: 'range'; field: string; min?: number; max?: number }
  | { type: 'length'; field: string; min?: number; max?: number }

export interface FieldValidator {
  name: string
  field: string
  check(value: unknown, record: DataRecord): string | undefined
}

function formatValue(value: unknown): string {
  return typeof value === 'string' ? `'${value}'` : String(value)
}

function matchesType(value: unknown, expected: ValueType): boolean {
  switch (expected) {
    case 'string':
      return typeof value === 'string'
    case 'number':
      return typeof value === 'number' ? Number.isFinite(value) : typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))
    case 'boolean':
      return typeof value === 'boolean' || value === 'true' || value === 'false'
    case 'date':
      if (value instanceof Date) return !Number.isNaN(value.getTime())
      return typeof value === 'string' && !Number.isNaN(Date.parse(value))
  }
}

export function createValidator(definition: ValidatorDefinition): FieldValidator {
  const { field } = definition

  switch (definition.type) {
    case 'required':
      return {
        name: `required_${field}`,
        field,
        check: value =>
          value == null || String(value).trim() === '' ? 'Field is required but is null or empty' : undefined,
      }

    case 'type': {
      const { expected } = definition
      return {
        name: `type_${field}`,
        field,
        check: value => {
          if (value == null) return undefined
          return matchesType(value, expected) ? undefined : `Value ${formatValue(value)} is not a valid ${expected}`
        },
      }
    }

    case 'pattern': {
      let regex: RegExp
      try {
        regex = new RegExp(definition.pattern)
      } catch (error) {
        throw new ConfigurationError(`Invalid pattern for field "${field}": ${definition.pattern}`, {
          issues: [String(error)],
        })
      }
      const { pattern, message } = definition
      return {
        name: `pattern_${field}`,
        field,
        check: value => {
          const text = value == null ? '' : String(value)
          return regex.test(text) ? undefined : message ?? `Value '${text}' does not match pattern '${pattern}'`
        },
      }
    }

    case 'range': {
      const { min, max } = definition
      return {
        name: `range_${field}`,
        field,
        check: value => {
          if (value == null) return 'Value is null'
          const numeric = typeof value === 'number' ? value : Number(value)
          if (typeof value === 'boolean' || Number.isNaN(numeric) || String(value).trim() === '') {
            return `Value ${formatValue(value)} is not a valid number`
          }
          if ((min !== undefined && numeric < min) || (max !== undefined && numeric > max)) {
            return `Value ${numeric} is not between ${min ?? '-Infinity'} and ${max ?? 'Infinity'}`
          }
          return undefined
        },
      }
    }

    case 'length': {
      const { min, max } = definition
      return {
        name: `length_${field}`,
        field,
        check: value => {
          const length = value == null ? 0 : String(value).length
          if ((min !== undefined && length < min) || (max !== undefined && length > max)) {
            return `Length ${length} is not between ${min ?? 0} and ${max ?? 'Infinity'}`
          }
          return undefined
        },
      }
    }
  }
}

/**
 * Validator backed by an arbitrary check; `true` passes, `false` or a string fails
 */
export function customValidator(
  name: string,
  field: string,
  check: (value: unknown, record: DataRecord) => boolean | string
): FieldValidator {
  return {
    name,
    field,
    check: (value, record) => {
      const outcome = check(value, record)
      if (outcome === true) return undefined
      return outcome === false ? `Validation "${name}" failed` : outcome
    },
  }
}
