import { describe, it, expect } from 'vitest'
import { DEFAULT_CATALOG, expectedMetricTypes } from '../src/catalog/index.js'
import type { CategoricalPredicate, RangePredicate, ThresholdPredicate } from '../src/catalog/index.js'
import {
  computeConfidence,
  evaluateCategorical,
  evaluateRange,
  evaluateThreshold,
  mapThreats,
} from '../src/mapping/index.js'
import { sanitizeMetrics } from '../src/sanitize/index.js'

const AUC: ThresholdPredicate = { kind: 'gt', boundaries: { low: 0.55, medium: 0.6, high: 0.7 } }
const NN_DISTANCE: ThresholdPredicate = { kind: 'lt', boundaries: { low: 1.0, medium: 0.5, high: 0.1 } }
const VARIANCE: RangePredicate = { kind: 'range', min: 0.8, max: 1.25, boundaries: { low: 0, medium: 0.2, high: 0.5 } }
const DRIFT: CategoricalPredicate = { kind: 'categorical', categories: { medium: ['moderate'], high: ['high', 'severe'] } }

function mapRaw(raw: Record<string, unknown>) {
  const { snapshot } = sanitizeMetrics(raw, expectedMetricTypes())
  return mapThreats(snapshot, DEFAULT_CATALOG)
}

describe('predicates', () => {
  it('picks the most severe crossed boundary', () => {
    const match = evaluateThreshold(AUC, 'auc', 0.65)
    expect(match?.severity).toBe('medium')
    expect(match?.condition).toBe('auc = 0.65 > 0.6 (medium)')
    expect(match?.excess).toBeCloseTo(0.1, 10)
  })

  it('treats a strict boundary as not crossed on equality', () => {
    expect(evaluateThreshold(AUC, 'auc', 0.7)?.severity).toBe('medium')
    expect(evaluateThreshold(AUC, 'auc', 0.55)).toBeNull()
  })

  it('gives an inclusive boundary to the more severe tier', () => {
    const rate: ThresholdPredicate = { kind: 'gte', boundaries: { low: 0.005, medium: 0.01, high: 0.02 } }
    expect(evaluateThreshold(rate, 'rate', 0.02)?.condition).toBe('rate = 0.02 >= 0.02 (high)')
  })

  it('measures lt excess below the entry boundary', () => {
    const match = evaluateThreshold(NN_DISTANCE, 'd', 0.05)
    expect(match?.condition).toBe('d = 0.05 < 0.1 (high)')
    expect(match?.excess).toBeCloseTo(0.95, 10)
  })

  it('grades range deviations outside the band', () => {
    const match = evaluateRange(VARIANCE, 'v', 1.6)
    expect(match?.severity).toBe('medium')
    expect(match?.condition).toBe('v = 1.6 outside [0.8, 1.25] by 0.35 (medium)')
    expect(evaluateRange(VARIANCE, 'v', 1.0)).toBeNull()
    expect(evaluateRange(VARIANCE, 'v', 0.8)).toBeNull()
  })

  it('matches categories case-insensitively', () => {
    expect(evaluateCategorical(DRIFT, 'drift', 'Severe')?.condition).toBe('drift = "Severe" in [high, severe] (high)')
    expect(evaluateCategorical(DRIFT, 'drift', 'low')).toBeNull()
  })
})

describe('computeConfidence', () => {
  it('scales linearly from the floor', () => {
    const linear = { kind: 'linear', floor: 0.3, scale: 0.3 } as const
    expect(computeConfidence(linear, 'medium', 0.1)).toBe(0.533)
    expect(computeConfidence(linear, 'high', 5)).toBe(1)
    expect(computeConfidence(linear, 'low', -1)).toBe(0.3)
  })

  it('scales logarithmically over decades', () => {
    const log = { kind: 'log', floor: 0.3, decades: 2 } as const
    expect(computeConfidence(log, 'low', 0)).toBe(0.3)
    expect(computeConfidence(log, 'medium', 9)).toBe(0.65)
    expect(computeConfidence(log, 'high', 99)).toBe(1)
  })

  it('reads tiered confidence from the severity', () => {
    expect(computeConfidence({ kind: 'tiered', low: 0.3, medium: 0.6, high: 0.9 }, 'medium', 0)).toBe(0.6)
  })

  it('never decreases as the excess grows', () => {
    const linear = { kind: 'linear', floor: 0.3, scale: 0.5 } as const
    let previous = 0
    for (let excess = 0; excess <= 2; excess += 0.05) {
      const value = computeConfidence(linear, 'low', excess)
      expect(value).toBeGreaterThanOrEqual(previous)
      previous = value
    }
  })
})

describe('mapThreats', () => {
  it('reads a metric through its alias', () => {
    const { signals } = mapRaw({ membership_inference_auc: 0.65 })
    expect(signals).toHaveLength(1)
    expect(signals[0]).toMatchObject({
      threat_name: 'membership_inference',
      rule_id: 'membership_inference_auc',
      severity: 'medium',
      confidence: 0.533,
      triggered_conditions: ['membership_inference_auc = 0.65 > 0.6 (medium)'],
      evidence: { membership_inference_auc: 0.65 },
    })
  })

  it('prefers the primary path over an alias', () => {
    const { signals } = mapRaw({ membership_inference_auc: 0.9, privacy_risk: { membership_inference_auc: 0.65 } })
    expect(signals[0].severity).toBe('medium')
    expect(Object.keys(signals[0].evidence)).toEqual(['privacy_risk.membership_inference_auc'])
  })

  it('lists the triggering metric before its context', () => {
    const { signals } = mapRaw({
      privacy_risk: { membership_inference_accuracy: 0.58, membership_inference_auc: 0.72 },
    })
    expect(signals[0].severity).toBe('high')
    expect(signals[0].confidence).toBe(0.697)
    expect(Object.keys(signals[0].evidence)).toEqual([
      'privacy_risk.membership_inference_auc',
      'privacy_risk.membership_inference_accuracy',
    ])
  })

  it('treats absent metrics as not applicable once any rule was evaluated', () => {
    const { signals, outcomes, unresolved, evaluated } = mapRaw({ privacy_score: 0.9 })
    expect(signals).toEqual([])
    expect(unresolved).toEqual([])
    expect(evaluated).toBe(1)
    expect(outcomes.filter((o) => o.status === 'clear').map((o) => o.rule.id)).toEqual(['privacy_score'])
    expect(outcomes.filter((o) => o.status === 'not_applicable')).toHaveLength(12)
  })

  it('reports present but invalid metrics as unresolved', () => {
    const { unresolved } = mapRaw({ privacy_score: NaN, utility_score: 0.9 })
    expect(unresolved.map((u) => u.note)).toEqual(['insufficient data to evaluate privacy_leakage (privacy_score)'])
  })

  it('falls back to a valid alias when the primary path is invalid', () => {
    const { signals, unresolved } = mapRaw({ privacy_risk: { membership_inference_auc: NaN }, membership_inference_auc: 0.65 })
    expect(unresolved).toEqual([])
    expect(signals[0].evidence).toEqual({ membership_inference_auc: 0.65 })
  })

  it('marks every rule unresolved when nothing could be evaluated', () => {
    const { signals, unresolved, evaluated } = mapRaw({})
    expect(signals).toEqual([])
    expect(evaluated).toBe(0)
    expect(unresolved).toHaveLength(13)
    expect(unresolved[0].note).toBe('insufficient data to evaluate membership_inference (membership_inference_auc)')
  })

  it('evaluates each rule independently, in catalog order', () => {
    const { signals } = mapRaw({ utility_score: 0.6, privacy_score: 0.5, statistical_drift: 'moderate' })
    expect(signals.map((s) => s.rule_id)).toEqual(['privacy_score', 'drift_category', 'utility_score'])
    expect(signals.map((s) => s.severity)).toEqual(['high', 'medium', 'high'])
  })

  it('returns frozen signals', () => {
    const { signals } = mapRaw({ utility_score: 0.6 })
    expect(Object.isFrozen(signals[0])).toBe(true)
    expect(Object.isFrozen(signals[0].evidence)).toBe(true)
  })
})
