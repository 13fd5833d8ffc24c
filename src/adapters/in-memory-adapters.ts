import { DataRecord } from '../records'
import { FatalAdapterError, TransientAdapterError, throwIfAborted } from '../pipelines/errors'
import type { AdapterConfig, DestinationAdapter, SourceAdapter, WriteFailure, WriteResult } from './adapter'
import { DEFAULT_BATCH_SIZE } from './adapter'

type Row = Record<string, unknown>

/**
 * Named datasets shared by in-memory sources and destinations; the
 * connection string selects the dataset
 */
export class InMemoryDataStore {
  private datasets = new Map<string, Row[]>()

  put(name: string, rows: Row[]): void {
    this.datasets.set(name, [...rows])
  }

  append(name: string, rows: Row[]): void {
    const existing = this.datasets.get(name) ?? []
    existing.push(...rows)
    this.datasets.set(name, existing)
  }

  get(name: string): Row[] {
    return this.datasets.get(name) ?? []
  }

  has(name: string): boolean {
    return this.datasets.has(name)
  }

  clear(): void {
    this.datasets.clear()
  }
}

/**
 * Simulated failures for exercising retry and error policies in tests
 */
export interface FailurePlan {
  // The first N calls raise TransientAdapterError
  transientFailures?: number
  // Every call raises FatalAdapterError with this message
  fatalError?: string
}

class FailureSimulator {
  private calls = 0

  constructor(private readonly plan: FailurePlan, private readonly adapter: string) {}

  get callCount(): number {
    return this.calls
  }

  check(): void {
    this.calls++
    if (this.plan.fatalError) {
      throw new FatalAdapterError(this.plan.fatalError, this.adapter)
    }
    if (this.plan.transientFailures !== undefined && this.calls <= this.plan.transientFailures) {
      throw new TransientAdapterError(`${this.adapter} temporarily unavailable (call ${this.calls})`, this.adapter)
    }
  }
}

export class InMemorySourceAdapter implements SourceAdapter {
  readonly config: AdapterConfig
  private readonly failures: FailureSimulator

  constructor(
    private readonly store: InMemoryDataStore,
    config: Partial<AdapterConfig> & { connectionString: string },
    plan: FailurePlan = {}
  ) {
    this.config = { connectorType: 'memory', batchSize: DEFAULT_BATCH_SIZE, ...config }
    this.failures = new FailureSimulator(plan, `memory-source:${this.config.connectionString}`)
  }

  get readCount(): number {
    return this.failures.callCount
  }

  async *read(signal?: AbortSignal): AsyncIterable<DataRecord> {
    this.failures.check()
    const rows = this.store.get(this.config.connectionString)

    for (let i = 0; i < rows.length; i++) {
      if (i % this.config.batchSize === 0) {
        throwIfAborted(signal)
      }
      yield DataRecord.from(rows[i], { source: this.config.connectionString, rowNumber: i + 1 })
    }
  }
}

export interface InMemoryDestinationOptions {
  // Records matching this predicate are rejected individually
  reject?: (record: DataRecord) => string | undefined
}

export class InMemoryDestinationAdapter implements DestinationAdapter {
  readonly config: AdapterConfig
  private readonly failures: FailureSimulator

  constructor(
    private readonly store: InMemoryDataStore,
    config: Partial<AdapterConfig> & { connectionString: string },
    plan: FailurePlan = {},
    private readonly options: InMemoryDestinationOptions = {}
  ) {
    this.config = { connectorType: 'memory', batchSize: DEFAULT_BATCH_SIZE, ...config }
    this.failures = new FailureSimulator(plan, `memory-destination:${this.config.connectionString}`)
  }

  get writeCount(): number {
    return this.failures.callCount
  }

  async write(records: AsyncIterable<DataRecord>, signal?: AbortSignal): Promise<WriteResult> {
    this.failures.check()

    const failures: WriteFailure[] = []
    let batch: Row[] = []
    let written = 0

    const flush = (): void => {
      this.store.append(this.config.connectionString, batch)
      written += batch.length
      batch = []
    }

    for await (const record of records) {
      throwIfAborted(signal)
      const rejection = this.options.reject?.(record)
      if (rejection !== undefined) {
        failures.push({ recordId: record.id, message: rejection })
        continue
      }
      batch.push(record.toObject())
      if (batch.length >= this.config.batchSize) {
        flush()
      }
    }
    flush()

    return { written, failed: failures.length, failures }
  }
}
