import { describe, it, expect } from 'vitest'
import '../src/formats.js'
import { Value } from '@sinclair/typebox/value'
import {
  compileCatalog,
  DEFAULT_CATALOG,
  DEFAULT_RULES,
  ThresholdRule,
  expectedMetricTypes,
  getMetricsForThreat,
  getRulesForThreat,
  listThreats,
} from '../src/catalog/index.js'
import { CatalogConfigError } from '../src/errors/index.js'
import { THREAT_IDS } from '../src/threat/index.js'

function testRule(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 'test_rule',
    threat: 'membership_inference',
    title: 'Test rule',
    impacted_property: 'privacy',
    description: '',
    metric: 'm',
    priority: 1,
    predicate: { kind: 'gt', boundaries: { low: 1, medium: 2, high: 3 } },
    confidence: { kind: 'linear', floor: 0.3, scale: 1 },
    ...overrides,
  }
}

function compileProblems(rules: unknown[]): readonly string[] {
  try {
    compileCatalog(rules)
  } catch (err) {
    if (err instanceof CatalogConfigError) return err.problems
    throw err
  }
  return []
}

describe('default catalog', () => {
  it('every row validates against ThresholdRule', () => {
    for (const rule of DEFAULT_RULES) {
      expect(Value.Check(ThresholdRule, rule)).toBe(true)
    }
  })

  it('compiles all rows in declaration order', () => {
    expect(DEFAULT_CATALOG.version).toBe('2.1.0')
    expect(DEFAULT_CATALOG.rules).toHaveLength(13)
    expect(DEFAULT_CATALOG.rules.map((r) => r.index)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12])
    expect(Object.isFrozen(DEFAULT_CATALOG.rules[0].predicate)).toBe(true)
  })

  it('covers every threat id', () => {
    expect(listThreats()).toEqual([...THREAT_IDS])
  })

  it('looks up rules and metric paths per threat', () => {
    expect(getRulesForThreat('distribution_drift').map((r) => r.id)).toEqual([
      'drift_kl_divergence',
      'drift_category',
      'drift_variance_ratio',
    ])
    expect(getMetricsForThreat('near_duplicate')).toEqual([
      'privacy_risk.near_duplicates_rate',
      'near_duplicates_rate',
      'privacy_risk.near_duplicates_count',
      'near_duplicates_count',
    ])
  })

  it('derives the value type of every rule-read path', () => {
    const types = expectedMetricTypes()
    expect(types.size).toBe(24)
    expect(types.get('statistical_drift')).toBe('string')
    expect(types.get('utility_score')).toBe('number')
    expect(types.has('privacy_risk.avg_nn_distance')).toBe(false)
  })
})

describe('compileCatalog', () => {
  it('resolves paths and value types', () => {
    const catalog = compileCatalog([testRule({ aliases: ['m_alias'], context: ['ctx'] })], 'v9')
    const [rule] = catalog.rules
    expect(catalog.version).toBe('v9')
    expect(rule.paths).toEqual(['m', 'm_alias'])
    expect(rule.contextPaths).toEqual(['ctx'])
    expect(rule.valueType).toBe('number')
  })

  it('does not share structure with the caller rows', () => {
    const row = testRule()
    const catalog = compileCatalog([row])
    expect(catalog.rules[0].predicate).not.toBe(row.predicate)
    expect(Object.isFrozen(row)).toBe(false)
  })

  it('rejects an empty catalog', () => {
    expect(() => compileCatalog([])).toThrow('Threat catalog is invalid: catalog must contain at least one rule')
  })

  it('rejects a catalog that is not an array', () => {
    const parsed = JSON.parse('{"id":"test_rule"}')
    expect(() => compileCatalog(parsed)).toThrow(CatalogConfigError)
    expect(compileProblems(parsed)).toEqual(['catalog must be an array of rules'])
  })

  it('reports schema violations by row position', () => {
    const [problem] = compileProblems([{ id: 'Bad' }])
    expect(problem).toMatch(/^rule #0: /)
  })

  it('rejects duplicate ids', () => {
    expect(compileProblems([testRule(), testRule()])).toEqual(['rule "test_rule": duplicate id'])
  })

  it('requires ascending boundaries for gt rules', () => {
    const rule = testRule({ predicate: { kind: 'gt', boundaries: { low: 2, medium: 1 } } })
    expect(compileProblems([rule])).toEqual(['rule "test_rule": medium boundary (1) must be greater than low boundary (2)'])
  })

  it('requires descending boundaries for lt rules', () => {
    const rule = testRule({ predicate: { kind: 'lt', boundaries: { low: 0.5, high: 0.9 } } })
    expect(compileProblems([rule])).toEqual(['rule "test_rule": high boundary (0.9) must be less than low boundary (0.5)'])
  })

  it('requires at least one boundary', () => {
    const rule = testRule({ predicate: { kind: 'gte', boundaries: {} } })
    expect(compileProblems([rule])).toEqual(['rule "test_rule": at least one severity boundary is required'])
  })

  it('validates range bands', () => {
    const rule = testRule({ predicate: { kind: 'range', min: 2, max: 1, boundaries: { low: 0 } } })
    expect(compileProblems([rule])).toEqual(['rule "test_rule": range min (2) must be less than max (1)'])
  })

  it('rejects a category listed under two tiers', () => {
    const rule = testRule({
      predicate: { kind: 'categorical', categories: { medium: ['high'], high: ['HIGH'] } },
      confidence: { kind: 'tiered', low: 0.3, medium: 0.6, high: 0.9 },
    })
    expect(compileProblems([rule])).toEqual(['rule "test_rule": category "high" is listed under both high and medium'])
  })

  it('requires tiered confidence on categorical rules', () => {
    const rule = testRule({ predicate: { kind: 'categorical', categories: { high: ['high'] } } })
    expect(compileProblems([rule])).toEqual(['rule "test_rule": categorical rules require tiered confidence'])
  })

  it('rejects tiered confidence that drops with severity', () => {
    const rule = testRule({ confidence: { kind: 'tiered', low: 0.9, medium: 0.5, high: 0.6 } })
    expect(compileProblems([rule])).toEqual(['rule "test_rule": tiered confidence must not decrease with severity'])
  })

  it('rejects one path read as two value types', () => {
    const other = testRule({
      id: 'other',
      predicate: { kind: 'categorical', categories: { high: ['high'] } },
      confidence: { kind: 'tiered', low: 0.3, medium: 0.6, high: 0.9 },
    })
    expect(compileProblems([testRule(), other])).toEqual([
      'rule "other": path "m" is read as string but rule "test_rule" reads it as number',
    ])
  })

  it('reports every problem at once', () => {
    const err = (() => {
      try {
        compileCatalog([testRule(), testRule({ predicate: { kind: 'gt', boundaries: { low: 2, medium: 1 } } })])
      } catch (e) {
        return e
      }
      return undefined
    })()
    expect(err).toBeInstanceOf(CatalogConfigError)
    if (!(err instanceof CatalogConfigError)) return
    expect(err.code).toBe('CATALOG_INVALID')
    expect(err.problems).toEqual([
      'rule "test_rule": duplicate id',
      'rule "test_rule": medium boundary (1) must be greater than low boundary (2)',
    ])
  })
})
