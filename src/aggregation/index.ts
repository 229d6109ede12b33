export * from './summary.js'
export * from './aggregator.js'
