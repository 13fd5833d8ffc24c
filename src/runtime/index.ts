export * from './retry-handler'
export * from './resilience'
