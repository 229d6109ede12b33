import { Type, Static } from '@sinclair/typebox'
import { DatasetRiskSummary } from '../aggregation/summary.js'
import { OutputMode } from '../threat/enums.js'
import { ThreatSignal } from '../threat/signal.js'

export const ResultConfigEcho = Type.Object({
  top_threats_limit: Type.Integer({ minimum: 1 }),
  evidence_limit: Type.Integer({ minimum: 1 }),
  catalog_version: Type.String(),
  rule_count: Type.Integer({ minimum: 1 }),
}, { additionalProperties: false })

export type ResultConfigEcho = Static<typeof ResultConfigEcho>

export const ResultMetadata = Type.Object({
  version: Type.String({ format: 'semver' }),
  timestamp: Type.String({ format: 'date-time' }),
  mode: OutputMode,
  config: ResultConfigEcho,
}, { additionalProperties: false })

export type ResultMetadata = Static<typeof ResultMetadata>

/**
 * Outward envelope of one evaluation. Advisory only: the schema admits no
 * decision field, so nothing downstream can read an approval out of it.
 */
export const GovernanceResult = Type.Object({
  dataset_risk_summary: DatasetRiskSummary,
  threats: Type.Optional(Type.Array(ThreatSignal)),
  has_uncertainty: Type.Boolean(),
  uncertainty_notes: Type.Array(Type.String()),
  disclaimers: Type.Array(Type.String(), { minItems: 1 }),
  metadata: ResultMetadata,
}, { $id: 'GovernanceResult', description: 'Advisory governance assessment of a synthetic dataset.', additionalProperties: false })

export type GovernanceResult = Static<typeof GovernanceResult>
