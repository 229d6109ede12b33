export * from './rule.js'
export * from './defaults.js'
export * from './compile.js'
