import { Type, Static } from '@sinclair/typebox'
import { ImpactedProperty, ThreatId } from '../threat/enums.js'

/** Boundary per severity tier; at least one tier must be present */
export const TierBoundaries = Type.Object({
  low: Type.Optional(Type.Number()),
  medium: Type.Optional(Type.Number()),
  high: Type.Optional(Type.Number()),
}, { additionalProperties: false })

export type TierBoundaries = Static<typeof TierBoundaries>

/** Higher is worse for gt/gte, lower is worse for lt */
export const ThresholdPredicate = Type.Object({
  kind: Type.Union([Type.Literal('gt'), Type.Literal('gte'), Type.Literal('lt')]),
  boundaries: TierBoundaries,
}, { additionalProperties: false })

export type ThresholdPredicate = Static<typeof ThresholdPredicate>

/**
 * Acceptable band [min, max]. A value outside the band deviates by its
 * distance to the nearest edge, and the boundaries apply to that deviation.
 */
export const RangePredicate = Type.Object({
  kind: Type.Literal('range'),
  min: Type.Number(),
  max: Type.Number(),
  boundaries: TierBoundaries,
}, { additionalProperties: false })

export type RangePredicate = Static<typeof RangePredicate>

export const CategoricalPredicate = Type.Object({
  kind: Type.Literal('categorical'),
  categories: Type.Object({
    low: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
    medium: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
    high: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
  }, { additionalProperties: false }),
}, { additionalProperties: false })

export type CategoricalPredicate = Static<typeof CategoricalPredicate>

export const RulePredicate = Type.Union([ThresholdPredicate, RangePredicate, CategoricalPredicate])

export type RulePredicate = Static<typeof RulePredicate>

const Unit = Type.Number({ minimum: 0, maximum: 1 })

/** floor + (1 - floor) * min(excess / scale, 1) */
export const LinearConfidence = Type.Object({
  kind: Type.Literal('linear'),
  floor: Unit,
  scale: Type.Number({ exclusiveMinimum: 0 }),
}, { additionalProperties: false })

/** floor + (1 - floor) * min(log10(1 + excess) / decades, 1) */
export const LogConfidence = Type.Object({
  kind: Type.Literal('log'),
  floor: Unit,
  decades: Type.Number({ exclusiveMinimum: 0 }),
}, { additionalProperties: false })

/** Fixed confidence per severity tier */
export const TieredConfidence = Type.Object({
  kind: Type.Literal('tiered'),
  low: Unit,
  medium: Unit,
  high: Unit,
}, { additionalProperties: false })

export const ConfidenceFormula = Type.Union([LinearConfidence, LogConfidence, TieredConfidence])

export type ConfidenceFormula = Static<typeof ConfidenceFormula>

export const ThresholdRule = Type.Object({
  id: Type.String({ minLength: 1, pattern: '^[a-z][a-z0-9_]*$' }),
  threat: ThreatId,
  title: Type.String({ minLength: 1 }),
  impacted_property: ImpactedProperty,
  description: Type.String(),
  metric: Type.String({ minLength: 1 }),
  aliases: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
  context: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
  priority: Type.Integer({ minimum: 0 }),
  predicate: RulePredicate,
  confidence: ConfidenceFormula,
}, { $id: 'ThresholdRule', description: 'One declarative catalog row evaluated by the threat mapper.', additionalProperties: false })

export type ThresholdRule = Static<typeof ThresholdRule>
