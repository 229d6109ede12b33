import { Type, Static } from '@sinclair/typebox'
import { ImpactedProperty, Severity, ThreatId } from './enums.js'

/** A literal metric value as read from the sanitized snapshot */
export const MetricLiteral = Type.Union([Type.Number(), Type.String(), Type.Boolean()], {
  $id: 'MetricLiteral',
})

export type MetricLiteral = Static<typeof MetricLiteral>

export const ThreatSignal = Type.Object({
  threat_name: ThreatId,
  rule_id: Type.String({ minLength: 1 }),
  title: Type.String(),
  impacted_property: ImpactedProperty,
  severity: Severity,
  confidence: Type.Number({ minimum: 0, maximum: 1 }),
  triggered_conditions: Type.Array(Type.String(), { minItems: 1 }),
  evidence: Type.Record(Type.String(), MetricLiteral, {
    description: 'Metric path to the literal value it held; the triggering metric comes first',
  }),
  description: Type.String(),
}, { $id: 'ThreatSignal', description: 'One evidenced threat, produced by exactly one rule evaluation.', additionalProperties: false })

export type ThreatSignal = Static<typeof ThreatSignal>
