export * from './predicates.js'
export * from './confidence.js'
export * from './mapper.js'
