export * from './options.js'
export * from './pipeline.js'
