export * from './store'
export * from './memstore'
export * from './file-token-store'
