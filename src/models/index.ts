export * from './position.model'
export * from './change.model'
export * from './pipeline.model'
export * from './errors'
export * from './provider.model'
