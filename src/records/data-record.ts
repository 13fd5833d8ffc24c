/**
 * DataRecord - one row/event in flight
 *
 * A named-field bag owned by whichever stage currently holds it. Rules and
 * mappings mutate it in place; the field set only grows through an explicit
 * set().
 */

import { v4 as uuidv4 } from 'uuid'
import type { ErrorCode, ErrorSeverity } from '../types'

export type FieldValue = unknown

/**
 * Error recorded against a single record (rule action, mapping, validation)
 */
export interface RecordError {
  code: ErrorCode
  message: string
  source: string // rule name, mapping destination, validator
  severity: ErrorSeverity
  timestamp: string
  field?: string
}

export interface RecordMetadata {
  id?: string
  source?: string
  rowNumber?: number
}

export class DataRecord {
  readonly id: string
  readonly createdAt: string
  source?: string
  rowNumber?: number
  modifiedAt?: string
  skipped = false
  readonly metadata = new Map<string, unknown>()
  readonly errors: RecordError[] = []
  private readonly fields: Map<string, FieldValue>

  constructor(fields?: Iterable<[string, FieldValue]> | Record<string, FieldValue>, meta?: RecordMetadata) {
    this.id = meta?.id ?? uuidv4()
    this.createdAt = new Date().toISOString()
    this.source = meta?.source
    this.rowNumber = meta?.rowNumber
    this.fields = new Map(isIterable(fields) ? fields : Object.entries(fields ?? {}))
  }

  static from(object: Record<string, FieldValue>, meta?: RecordMetadata): DataRecord {
    return new DataRecord(object, meta)
  }

  get(field: string): FieldValue {
    return this.fields.get(field)
  }

  set(field: string, value: FieldValue): this {
    this.fields.set(field, value)
    this.modifiedAt = new Date().toISOString()
    return this
  }

  has(field: string): boolean {
    return this.fields.has(field)
  }

  remove(field: string): boolean {
    const removed = this.fields.delete(field)
    if (removed) {
      this.modifiedAt = new Date().toISOString()
    }
    return removed
  }

  fieldNames(): string[] {
    return Array.from(this.fields.keys())
  }

  get fieldCount(): number {
    return this.fields.size
  }

  entries(): IterableIterator<[string, FieldValue]> {
    return this.fields.entries()
  }

  toObject(): Record<string, FieldValue> {
    return Object.fromEntries(this.fields)
  }

  addError(error: Omit<RecordError, 'timestamp'>): void {
    this.errors.push({ ...error, timestamp: new Date().toISOString() })
  }

  get hasErrors(): boolean {
    return this.errors.length > 0
  }

  /**
   * Copy with the same identity, fields, metadata and errors
   */
  clone(): DataRecord {
    const copy = new DataRecord(this.fields, { id: this.id, source: this.source, rowNumber: this.rowNumber })
    copy.modifiedAt = this.modifiedAt
    copy.skipped = this.skipped
    for (const [key, value] of this.metadata) {
      copy.metadata.set(key, value)
    }
    copy.errors.push(...this.errors)
    return copy
  }

  toString(): string {
    return `DataRecord[id=${this.id}, fields=${this.fields.size}, source=${this.source ?? '-'}]`
  }
}

function isIterable(value: unknown): value is Iterable<[string, FieldValue]> {
  return typeof value === 'object' && value !== null && Symbol.iterator in value
}
