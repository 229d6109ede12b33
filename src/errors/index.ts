export * from './payload.js'
export * from './errors.js'
