/**
 * Source/Destination adapter contracts
 *
 * The core only depends on the connector type, connection string and batch
 * size. Adapters raise TransientAdapterError for failures worth retrying and
 * FatalAdapterError for everything else.
 */

import type { DataRecord } from '../records'

export interface AdapterConfig {
  connectorType: string
  connectionString: string
  batchSize: number
  options?: Record<string, unknown>
}

export const DEFAULT_BATCH_SIZE = 1000

export interface SourceAdapter {
  readonly config: AdapterConfig

  /**
   * Read records as an asynchronous sequence
   */
  read(signal?: AbortSignal): AsyncIterable<DataRecord>
}

export interface WriteFailure {
  recordId: string
  message: string
}

export interface WriteResult {
  written: number
  failed: number
  failures: WriteFailure[]
}

export interface DestinationAdapter {
  readonly config: AdapterConfig

  /**
   * Write records from an asynchronous sequence
   */
  write(records: AsyncIterable<DataRecord>, signal?: AbortSignal): Promise<WriteResult>
}

/**
 * Adapt an in-memory list to the adapter streaming contract
 */
export async function* toAsyncIterable<T>(items: Iterable<T>): AsyncIterable<T> {
  for (const item of items) {
    yield item
  }
}
