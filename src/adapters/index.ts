export * from './adapter'
export * from './in-memory-adapters'
export * from './adapter-registry'
