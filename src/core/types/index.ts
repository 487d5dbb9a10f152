export * from './backend'
export * from './execution'
export * from './outcome'
export * from './reporting'
export * from './run-config'
