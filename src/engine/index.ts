export * from './config.js'
export * from './audit.js'
export * from './engine.js'
