/**
 * Adapter Registry - configuration-based adapter instantiation
 *
 * Maps a connector type to a factory, so pipeline definitions can name their
 * connectors without code changes. The "memory" connector is registered by
 * default and backed by the registry's InMemoryDataStore.
 */

import { ConfigurationError } from '../pipelines/errors'
import type { AdapterConfig, DestinationAdapter, SourceAdapter } from './adapter'
import { InMemoryDataStore, InMemoryDestinationAdapter, InMemorySourceAdapter } from './in-memory-adapters'

export type SourceFactory = (config: AdapterConfig) => SourceAdapter
export type DestinationFactory = (config: AdapterConfig) => DestinationAdapter

export class AdapterRegistry {
  private readonly sources = new Map<string, SourceFactory>()
  private readonly destinations = new Map<string, DestinationFactory>()

  constructor(readonly memoryStore: InMemoryDataStore = new InMemoryDataStore()) {
    this.registerSource('memory', config => {
      const inline = config.options?.records
      if (Array.isArray(inline)) {
        this.memoryStore.put(config.connectionString, inline.filter(isRow))
      }
      return new InMemorySourceAdapter(this.memoryStore, config)
    })
    this.registerDestination('memory', config => new InMemoryDestinationAdapter(this.memoryStore, config))
  }

  registerSource(connectorType: string, factory: SourceFactory): this {
    this.sources.set(connectorType, factory)
    return this
  }

  registerDestination(connectorType: string, factory: DestinationFactory): this {
    this.destinations.set(connectorType, factory)
    return this
  }

  createSource(config: AdapterConfig): SourceAdapter {
    const factory = this.sources.get(config.connectorType)
    if (!factory) {
      throw new ConfigurationError(
        `Unknown source connector type: ${config.connectorType}. Available: ${this.sourceTypes().join(', ')}`
      )
    }
    return factory(config)
  }

  createDestination(config: AdapterConfig): DestinationAdapter {
    const factory = this.destinations.get(config.connectorType)
    if (!factory) {
      throw new ConfigurationError(
        `Unknown destination connector type: ${config.connectorType}. Available: ${this.destinationTypes().join(', ')}`
      )
    }
    return factory(config)
  }

  sourceTypes(): string[] {
    return Array.from(this.sources.keys())
  }

  destinationTypes(): string[] {
    return Array.from(this.destinations.keys())
  }
}

function isRow(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
