import { describe, it, expect } from 'vitest'
import { sanitizeMetrics, UNAVAILABLE } from '../src/sanitize/index.js'
import { expectedMetricTypes } from '../src/catalog/index.js'

describe('sanitizeMetrics', () => {
  it('flattens nested mappings into dotted paths', () => {
    const { snapshot, issues } = sanitizeMetrics({
      privacy_score: 0.9,
      privacy_risk: { membership_inference_auc: 0.6, leakage_risk_level: 'low' },
    })
    expect(snapshot).toEqual({
      privacy_score: 0.9,
      'privacy_risk.membership_inference_auc': 0.6,
      'privacy_risk.leakage_risk_level': 'low',
    })
    expect(issues).toEqual([])
  })

  it('discards non-finite numbers at any path', () => {
    const { snapshot, issues } = sanitizeMetrics({ a: NaN, x: { y: Infinity } })
    expect(snapshot.a).toBe(UNAVAILABLE)
    expect(snapshot['x.y']).toBe(UNAVAILABLE)
    expect(issues).toEqual([
      { path: 'a', reason: 'non_finite', message: 'metric a was non-finite, value discarded' },
      { path: 'x.y', reason: 'non_finite', message: 'metric x.y was non-finite, value discarded' },
    ])
  })

  it('discards blank strings', () => {
    const { snapshot, issues } = sanitizeMetrics({ label: '   ' })
    expect(snapshot.label).toBe(UNAVAILABLE)
    expect(issues[0].message).toBe('metric label was an empty string, value discarded')
  })

  it('rejects a value of the wrong type where a rule expects a number', () => {
    const expectations = new Map([['privacy_score', 'number' as const]])
    const { snapshot, issues } = sanitizeMetrics({ privacy_score: '0.9' }, expectations)
    expect(snapshot.privacy_score).toBe(UNAVAILABLE)
    expect(issues).toEqual([
      {
        path: 'privacy_score',
        reason: 'type_mismatch',
        message: 'metric privacy_score expected number but received string, treated as missing',
      },
    ])
  })

  it('records null only where a rule reads the path', () => {
    const { snapshot, issues } = sanitizeMetrics({ utility_score: null, notes: null }, expectedMetricTypes())
    expect(snapshot.utility_score).toBe(UNAVAILABLE)
    expect(Object.hasOwn(snapshot, 'notes')).toBe(false)
    expect(issues).toEqual([
      { path: 'utility_score', reason: 'null', message: 'metric utility_score was null, value discarded' },
    ])
  })

  it('reports arrays at expected paths as type mismatches', () => {
    const { issues } = sanitizeMetrics({ utility_score: [0.9] }, expectedMetricTypes())
    expect(issues[0].message).toBe('metric utility_score expected number but received array, treated as missing')
  })

  it('stops at circular references', () => {
    const raw: Record<string, unknown> = { a: 1 }
    raw.self = raw
    const { snapshot, issues } = sanitizeMetrics(raw)
    expect(snapshot.a).toBe(1)
    expect(snapshot.self).toBe(UNAVAILABLE)
    expect(issues[0].message).toBe('metric self is a circular reference, value discarded')
  })

  it('survives a getter that throws', () => {
    const raw: Record<string, unknown> = { ok: 2 }
    Object.defineProperty(raw, 'boom', {
      enumerable: true,
      get() {
        throw new Error('nope')
      },
    })
    const { snapshot, issues } = sanitizeMetrics(raw)
    expect(snapshot.ok).toBe(2)
    expect(issues).toEqual([
      { path: 'boom', reason: 'unreadable', message: 'metric boom could not be read (nope), value discarded' },
    ])
  })

  it('keeps issues in traversal order', () => {
    const { issues } = sanitizeMetrics({ z: NaN, a: { b: '' } })
    expect(issues.map((i) => i.path)).toEqual(['z', 'a.b'])
  })

  it('is idempotent', () => {
    const first = sanitizeMetrics(
      { privacy_score: NaN, utility_score: 0.8, privacy_risk: { leakage_risk_level: 'high' } },
      expectedMetricTypes()
    )
    const second = sanitizeMetrics(first.snapshot, expectedMetricTypes())
    expect(second.snapshot).toEqual(first.snapshot)
    expect(second.issues).toEqual([])
  })

  it('never mutates the input and returns a frozen snapshot', () => {
    const raw = Object.freeze({ privacy_score: NaN, nested: Object.freeze({ value: 1 }) })
    const { snapshot, issues } = sanitizeMetrics(raw)
    expect(Number.isNaN(raw.privacy_score)).toBe(true)
    expect(Object.isFrozen(snapshot)).toBe(true)
    expect(Object.isFrozen(issues)).toBe(true)
  })
})
