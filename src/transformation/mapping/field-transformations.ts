/**
 * Field transformations - named value transforms for mappings and rules
 *
 * Each entry is a factory taking config arguments and returning a
 * transform. null/undefined pass through unchanged except for `lookup`,
 * which falls back to its default.
 */

import { z } from 'zod'
import type { DataRecord } from '../../records'
import { ConfigurationError } from '../../pipelines/errors'

export type FieldTransform = (value: unknown, record?: DataRecord) => unknown

export interface TransformDefinition {
  name: string
  args?: Record<string, unknown>
}

export type TransformFactory = (args: Record<string, unknown>) => FieldTransform

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value
  if (typeof value === 'boolean') return value ? 1 : 0
  const parsed = typeof value === 'string' && value.trim() !== '' ? Number(value) : NaN
  if (Number.isNaN(parsed)) {
    throw new Error(`Cannot convert ${JSON.stringify(value)} to a number`)
  }
  return parsed
}

function toDate(value: unknown): Date {
  const date = value instanceof Date ? value : new Date(typeof value === 'number' ? value : String(value))
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Cannot convert ${JSON.stringify(value)} to a date`)
  }
  return date
}

function nullSafe(fn: (value: unknown, record?: DataRecord) => unknown): FieldTransform {
  return (value, record) => (value == null ? value : fn(value, record))
}

function parseArgs<T extends z.ZodTypeAny>(name: string, schema: T, args: Record<string, unknown>): z.infer<T> {
  const parsed = schema.safeParse(args)
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid arguments for transform "${name}"`, {
      issues: parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
    })
  }
  return parsed.data
}

const builtins: Record<string, TransformFactory> = {
  toUpper: () => nullSafe(value => String(value).toUpperCase()),
  toLower: () => nullSafe(value => String(value).toLowerCase()),
  trim: () => nullSafe(value => String(value).trim()),

  regexReplace: args => {
    const { pattern, replacement, flags } = parseArgs(
      'regexReplace',
      z.object({ pattern: z.string(), replacement: z.string().default(''), flags: z.string().default('g') }),
      args
    )
    let regex: RegExp
    try {
      regex = new RegExp(pattern, flags)
    } catch (error) {
      throw new ConfigurationError(`Invalid pattern for transform "regexReplace": ${pattern}`, { issues: [String(error)] })
    }
    return nullSafe(value => String(value).replace(regex, replacement))
  },

  // "{value}" is the input; any other "{name}" reads that field of the record
  format: args => {
    const { template } = parseArgs('format', z.object({ template: z.string() }), args)
    return nullSafe((value, record) =>
      template.replace(/\{(\w+)\}/g, (_, key: string) => {
        if (key === 'value') return String(value)
        const field = record?.get(key)
        return field == null ? '' : String(field)
      })
    )
  },

  round: args => {
    const { digits } = parseArgs('round', z.object({ digits: z.number().int().min(0).default(0) }), args)
    const factor = Math.pow(10, digits)
    return nullSafe(value => Math.round(toNumber(value) * factor) / factor)
  },
  multiply: args => {
    const { factor } = parseArgs('multiply', z.object({ factor: z.number() }), args)
    return nullSafe(value => toNumber(value) * factor)
  },
  add: args => {
    const { amount } = parseArgs('add', z.object({ amount: z.number() }), args)
    return nullSafe(value => toNumber(value) + amount)
  },
  abs: () => nullSafe(value => Math.abs(toNumber(value))),
  toNumber: () => nullSafe(toNumber),

  toBoolean: () =>
    nullSafe(value => {
      if (typeof value === 'boolean') return value
      const s = String(value).trim().toLowerCase()
      if (s === 'true' || s === '1' || s === 'yes' || s === 'y') return true
      if (s === 'false' || s === '0' || s === 'no' || s === 'n') return false
      throw new Error(`Cannot convert ${JSON.stringify(value)} to a boolean`)
    }),

  toIsoDate: () => nullSafe(value => toDate(value).toISOString()),
  addDays: args => {
    const { days } = parseArgs('addDays', z.object({ days: z.number() }), args)
    return nullSafe(value => {
      const date = new Date(toDate(value).getTime())
      date.setUTCDate(date.getUTCDate() + days)
      return date.toISOString()
    })
  },

  lookup: args => {
    const { table, defaultValue, caseInsensitive } = parseArgs(
      'lookup',
      z.object({
        table: z.record(z.unknown()),
        defaultValue: z.unknown().optional(),
        caseInsensitive: z.boolean().default(false),
      }),
      args
    )
    const entries = new Map<string, unknown>(
      Object.entries(table).map(([key, mapped]) => [caseInsensitive ? key.toLowerCase() : key, mapped])
    )
    return value => {
      if (value == null) return defaultValue ?? null
      const key = caseInsensitive ? String(value).toLowerCase() : String(value)
      return entries.has(key) ? entries.get(key) : defaultValue ?? null
    }
  },
}

/**
 * Name -> transform factory registry
 */
export class TransformRegistry {
  private readonly factories = new Map<string, TransformFactory>()

  constructor(initial: Record<string, TransformFactory> = builtins) {
    for (const [name, factory] of Object.entries(initial)) {
      this.factories.set(name, factory)
    }
  }

  register(name: string, factory: TransformFactory): this {
    this.factories.set(name, factory)
    return this
  }

  has(name: string): boolean {
    return this.factories.has(name)
  }

  names(): string[] {
    return Array.from(this.factories.keys())
  }

  /**
   * Build a transform from its definition; unknown names and bad arguments
   * raise ConfigurationError
   */
  create(definition: TransformDefinition | string): FieldTransform {
    const { name, args } = typeof definition === 'string' ? { name: definition, args: undefined } : definition
    const factory = this.factories.get(name)
    if (!factory) {
      throw new ConfigurationError(`Unknown field transform "${name}". Available: ${this.names().join(', ')}`)
    }
    return factory(args ?? {})
  }

  /**
   * Chain several transforms left to right
   */
  compose(definitions: Array<TransformDefinition | string>): FieldTransform {
    const transforms = definitions.map(definition => this.create(definition))
    return (value, record) => transforms.reduce<unknown>((current, transform) => transform(current, record), value)
  }
}

export const fieldTransforms = new TransformRegistry()
