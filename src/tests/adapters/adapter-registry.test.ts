import { describe, it, expect, beforeEach } from 'vitest'
import {
  AdapterRegistry,
  InMemoryDataStore,
  InMemoryDestinationAdapter,
  InMemorySourceAdapter,
  toAsyncIterable,
} from '../../adapters'
import { DataRecord } from '../../records'
import { CancellationError, ConfigurationError, FatalAdapterError, TransientAdapterError } from '../../pipelines/errors'

async function drain(iterable: AsyncIterable<DataRecord>): Promise<DataRecord[]> {
  const records: DataRecord[] = []
  for await (const record of iterable) {
    records.push(record)
  }
  return records
}

describe('in-memory adapters', () => {
  let store: InMemoryDataStore

  beforeEach(() => {
    store = new InMemoryDataStore()
    store.put('customers', [
      { id: 1, name: 'Ada' },
      { id: 2, name: 'Grace' },
      { id: 3, name: 'Edsger' },
    ])
  })

  describe('InMemorySourceAdapter', () => {
    it('should read rows as records with origin and row numbers', async () => {
      const source = new InMemorySourceAdapter(store, { connectionString: 'customers' })

      const records = await drain(source.read())

      expect(records.map(r => r.get('name'))).toEqual(['Ada', 'Grace', 'Edsger'])
      expect(records.map(r => r.rowNumber)).toEqual([1, 2, 3])
      expect(records[0].source).toBe('customers')
      expect(source.config).toEqual({ connectorType: 'memory', connectionString: 'customers', batchSize: 1000 })
    })

    it('should read nothing from an unknown dataset', async () => {
      const source = new InMemorySourceAdapter(store, { connectionString: 'missing' })
      expect(await drain(source.read())).toEqual([])
    })

    it('should fail transiently for the planned number of reads', async () => {
      const source = new InMemorySourceAdapter(store, { connectionString: 'customers' }, { transientFailures: 2 })

      await expect(drain(source.read())).rejects.toBeInstanceOf(TransientAdapterError)
      await expect(drain(source.read())).rejects.toThrow('memory-source:customers temporarily unavailable (call 2)')
      expect(await drain(source.read())).toHaveLength(3)
      expect(source.readCount).toBe(3)
    })

    it('should fail fatally on every read', async () => {
      const source = new InMemorySourceAdapter(store, { connectionString: 'customers' }, { fatalError: 'access denied' })

      await expect(drain(source.read())).rejects.toBeInstanceOf(FatalAdapterError)
    })

    it('should check the signal at batch boundaries', async () => {
      const source = new InMemorySourceAdapter(store, { connectionString: 'customers', batchSize: 2 })
      const controller = new AbortController()
      const seen: DataRecord[] = []

      await expect(
        (async () => {
          for await (const record of source.read(controller.signal)) {
            seen.push(record)
            controller.abort()
          }
        })()
      ).rejects.toBeInstanceOf(CancellationError)
      expect(seen).toHaveLength(2)
    })
  })

  describe('InMemoryDestinationAdapter', () => {
    it('should append written records to the dataset in batches', async () => {
      const destination = new InMemoryDestinationAdapter(store, { connectionString: 'warehouse', batchSize: 2 })
      const records = [1, 2, 3].map(id => DataRecord.from({ id }))

      const result = await destination.write(toAsyncIterable(records))

      expect(result).toEqual({ written: 3, failed: 0, failures: [] })
      expect(store.get('warehouse')).toEqual([{ id: 1 }, { id: 2 }, { id: 3 }])
      expect(destination.writeCount).toBe(1)
    })

    it('should reject individual records', async () => {
      const destination = new InMemoryDestinationAdapter(
        store,
        { connectionString: 'warehouse' },
        {},
        { reject: record => (record.get('id') === 2 ? 'duplicate key' : undefined) }
      )
      const records = [1, 2, 3].map(id => DataRecord.from({ id }, { id: `r${id}` }))

      const result = await destination.write(toAsyncIterable(records))

      expect(result).toEqual({ written: 2, failed: 1, failures: [{ recordId: 'r2', message: 'duplicate key' }] })
      expect(store.get('warehouse')).toEqual([{ id: 1 }, { id: 3 }])
    })

    it('should fail transiently before writing anything', async () => {
      const destination = new InMemoryDestinationAdapter(store, { connectionString: 'warehouse' }, { transientFailures: 1 })

      await expect(destination.write(toAsyncIterable([DataRecord.from({ id: 1 })]))).rejects.toBeInstanceOf(
        TransientAdapterError
      )
      expect(store.has('warehouse')).toBe(false)
    })
  })
})

describe('AdapterRegistry', () => {
  it('should create memory adapters by default', () => {
    const registry = new AdapterRegistry()

    expect(registry.sourceTypes()).toEqual(['memory'])
    expect(registry.destinationTypes()).toEqual(['memory'])
    expect(registry.createSource({ connectorType: 'memory', connectionString: 'a', batchSize: 10 })).toBeInstanceOf(
      InMemorySourceAdapter
    )
  })

  it('should seed the memory dataset from inline records', async () => {
    const registry = new AdapterRegistry()
    const source = registry.createSource({
      connectorType: 'memory',
      connectionString: 'inline',
      batchSize: 100,
      options: { records: [{ a: 1 }, 'not a row', { a: 2 }] },
    })

    const records = await drain(source.read())

    expect(records.map(r => r.get('a'))).toEqual([1, 2])
    expect(registry.memoryStore.get('inline')).toHaveLength(2)
  })

  it('should share the memory store between sources and destinations', async () => {
    const registry = new AdapterRegistry()
    const destination = registry.createDestination({ connectorType: 'memory', connectionString: 'out', batchSize: 10 })

    await destination.write(toAsyncIterable([DataRecord.from({ x: 1 })]))

    const source = registry.createSource({ connectorType: 'memory', connectionString: 'out', batchSize: 10 })
    expect((await drain(source.read())).map(r => r.get('x'))).toEqual([1])
  })

  it('should reject unknown connector types', () => {
    const registry = new AdapterRegistry()

    expect(() => registry.createSource({ connectorType: 'sftp', connectionString: 'x', batchSize: 1 })).toThrow(
      ConfigurationError
    )
    expect(() => registry.createDestination({ connectorType: 'sftp', connectionString: 'x', batchSize: 1 })).toThrow(
      'Unknown destination connector type: sftp. Available: memory'
    )
  })

  it('should register custom connectors', () => {
    const store = new InMemoryDataStore()
    const registry = new AdapterRegistry().registerSource(
      'fixture',
      config => new InMemorySourceAdapter(store, { ...config, connectorType: 'fixture' })
    )

    const source = registry.createSource({ connectorType: 'fixture', connectionString: 'x', batchSize: 5 })

    expect(source.config.connectorType).toBe('fixture')
    expect(registry.sourceTypes()).toEqual(['memory', 'fixture'])
  })
})
