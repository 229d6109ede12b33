import { Type, Static } from '@sinclair/typebox'

/** Stable threat identifiers. New threats are added here and in the catalog. */
export const ThreatId = Type.Union([
  Type.Literal('membership_inference'),
  Type.Literal('record_linkage'),
  Type.Literal('near_duplicate'),
  Type.Literal('attribute_inference'),
  Type.Literal('privacy_leakage'),
  Type.Literal('schema_violation'),
  Type.Literal('distribution_drift'),
  Type.Literal('correlation_inconsistency'),
  Type.Literal('utility_degradation'),
], { $id: 'ThreatId', description: 'Stable threat identifier' })

export type ThreatId = Static<typeof ThreatId>

/** Per-signal severity tier */
export const Severity = Type.Union([
  Type.Literal('low'),
  Type.Literal('medium'),
  Type.Literal('high'),
], { $id: 'Severity', description: 'Severity tier of a single threat signal' })

export type Severity = Static<typeof Severity>

/** Dataset-wide risk level derived from all signals */
export const RiskLevel = Type.Union([
  Type.Literal('low'),
  Type.Literal('warning'),
  Type.Literal('critical'),
  Type.Literal('unknown'),
], { $id: 'RiskLevel', description: 'Aggregate risk level of a dataset evaluation' })

export type RiskLevel = Static<typeof RiskLevel>

export const ImpactedProperty = Type.Union([
  Type.Literal('privacy'),
  Type.Literal('utility'),
  Type.Literal('consistency'),
], { $id: 'ImpactedProperty', description: 'Dataset property a threat puts at risk' })

export type ImpactedProperty = Static<typeof ImpactedProperty>

/** Output detail: summary omits threats, detailed truncates evidence, full keeps everything */
export const OutputMode = Type.Union([
  Type.Literal('summary'),
  Type.Literal('detailed'),
  Type.Literal('full'),
], { $id: 'OutputMode', description: 'Output detail mode', default: 'summary' })

export type OutputMode = Static<typeof OutputMode>

/** Severity tiers from most to least severe */
export const SEVERITY_ORDER: readonly Severity[] = ['high', 'medium', 'low']

export const SEVERITY_RANK: Record<Severity, number> = {
  high: 3,
  medium: 2,
  low: 1,
}

export const THREAT_IDS: readonly ThreatId[] = ThreatId.anyOf.map((literal) => literal.const)
