export * from './sanitizer.js'
