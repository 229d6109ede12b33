/**
 * dataset-threat-governance: threat interpretation and risk aggregation
 * for synthetic dataset metrics.
 *
 * Advisory only: results describe risk and never carry an approve/reject decision.
 * Wire format: snake_case JSON.
 *
 * Subpath imports available:
 *   import { DEFAULT_RULES, compileCatalog } from 'dataset-threat-governance/catalog'
 *   import { withAdvisory } from 'dataset-threat-governance/advisory'
 */

import './formats.js'

export * from './threat/index.js'
export * from './errors/index.js'
export * from './catalog/index.js'
export * from './sanitize/index.js'
export * from './mapping/index.js'
export * from './aggregation/index.js'
export * from './result/index.js'
export * from './engine/index.js'
