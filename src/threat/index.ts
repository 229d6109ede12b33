export * from './enums.js'
export * from './signal.js'
