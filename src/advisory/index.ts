export * from './provider.js'
export * from './attach.js'
export * from './ollama.js'
