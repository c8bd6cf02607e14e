// General
export * from './diagnostic.ts'
export * from './errors.ts'
export * from './logging.ts'
export * from './utils.ts'

// Clients
export * from './clients/index.ts'
