export * from './callbacks.ts'
export * from './cluster/index.ts'
