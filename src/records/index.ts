export * from './data-record'
