export * from './storage'
export * from './pg-storage'
export * from './client'
export * from './schema'
