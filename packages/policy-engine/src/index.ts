export * from './contracts'
export * from './data-scope'
export * from './mounts'
export * from './permissions'
export * from './registry'
