export * from './result.js'
export * from './assembler.js'
