import { Type, Static } from '@sinclair/typebox'
import { RiskLevel } from '../threat/enums.js'
import { ThreatSignal } from '../threat/signal.js'

const Count = Type.Integer({ minimum: 0 })
const Unit = Type.Number({ minimum: 0, maximum: 1 })

export const SeverityBreakdown = Type.Object({
  high: Count,
  medium: Count,
  low: Count,
}, { additionalProperties: false })

export type SeverityBreakdown = Static<typeof SeverityBreakdown>

export const PropertyBreakdown = Type.Object({
  privacy: Count,
  utility: Count,
  consistency: Count,
}, { additionalProperties: false })

export type PropertyBreakdown = Static<typeof PropertyBreakdown>

export const ConfidenceStats = Type.Object({
  avg: Unit,
  max: Unit,
  min: Unit,
}, { additionalProperties: false })

export type ConfidenceStats = Static<typeof ConfidenceStats>

export const DatasetRiskSummary = Type.Object({
  overall_risk_level: RiskLevel,
  total_threats: Count,
  severity_breakdown: SeverityBreakdown,
  property_breakdown: PropertyBreakdown,
  top_threats: Type.Array(ThreatSignal, { description: 'Highest ranked signals, most significant first' }),
  escalation_reason: Type.String(),
  confidence_stats: ConfidenceStats,
  summary: Type.String(),
}, { $id: 'DatasetRiskSummary', description: 'Dataset-level aggregation of all threat signals of one evaluation.', additionalProperties: false })

export type DatasetRiskSummary = Static<typeof DatasetRiskSummary>
