import { Value } from '@sinclair/typebox/value'
import { CatalogConfigError } from '../errors/errors.js'
import { deepFreeze } from '../util/freeze.js'
import { SEVERITY_ORDER } from '../threat/enums.js'
import type { Severity, ThreatId } from '../threat/enums.js'
import { ThresholdRule } from './rule.js'
import type { TierBoundaries } from './rule.js'
import { DEFAULT_CATALOG_VERSION, DEFAULT_RULES } from './defaults.js'

export type MetricValueType = 'number' | 'string'

/** A validated, frozen catalog row with its lookup data resolved */
export type CompiledRule = Readonly<ThresholdRule> & {
  /** Declaration order within the catalog */
  readonly index: number
  /** Primary metric path followed by its aliases */
  readonly paths: readonly string[]
  readonly contextPaths: readonly string[]
  readonly valueType: MetricValueType
}

export interface CompiledCatalog {
  readonly version: string
  readonly rules: readonly CompiledRule[]
}

const MAX_SCHEMA_ERRORS_PER_RULE = 3

// ---------------------------------------------------------------------------
// Boundary checks
// ---------------------------------------------------------------------------
function presentTiers(boundaries: TierBoundaries): [Severity, number][] {
  const tiers: [Severity, number][] = []
  for (const severity of [...SEVERITY_ORDER].reverse()) {
    const boundary = boundaries[severity]
    if (boundary !== undefined) tiers.push([severity, boundary])
  }
  return tiers
}

/** Tiers listed least to most severe must move strictly in one direction. */
function checkBoundaryOrder(
  label: string,
  boundaries: TierBoundaries,
  direction: 'ascending' | 'descending'
): string[] {
  const tiers = presentTiers(boundaries)
  if (tiers.length === 0) return [`${label}: at least one severity boundary is required`]

  const problems: string[] = []
  for (const [severity, boundary] of tiers) {
    if (!Number.isFinite(boundary)) problems.push(`${label}: ${severity} boundary must be finite`)
  }
  for (let i = 1; i < tiers.length; i++) {
    const [prevSeverity, prev] = tiers[i - 1]
    const [severity, current] = tiers[i]
    const ordered = direction === 'ascending' ? current > prev : current < prev
    if (!ordered) {
      const relation = direction === 'ascending' ? 'greater' : 'less'
      problems.push(`${label}: ${severity} boundary (${current}) must be ${relation} than ${prevSeverity} boundary (${prev})`)
    }
  }
  return problems
}

function checkRule(rule: ThresholdRule): string[] {
  const label = `rule "${rule.id}"`
  const { predicate, confidence } = rule

  switch (predicate.kind) {
    case 'gt':
    case 'gte':
      return checkBoundaryOrder(label, predicate.boundaries, 'ascending')

    case 'lt':
      return checkBoundaryOrder(label, predicate.boundaries, 'descending')

    case 'range': {
      const problems = checkBoundaryOrder(label, predicate.boundaries, 'ascending')
      if (!(predicate.min < predicate.max)) {
        problems.push(`${label}: range min (${predicate.min}) must be less than max (${predicate.max})`)
      }
      for (const [severity, boundary] of presentTiers(predicate.boundaries)) {
        if (boundary < 0) problems.push(`${label}: ${severity} deviation boundary must not be negative`)
      }
      return problems
    }

    case 'categorical': {
      const problems: string[] = []
      const seen = new Map<string, Severity>()
      let total = 0
      for (const severity of SEVERITY_ORDER) {
        for (const category of predicate.categories[severity] ?? []) {
          total++
          const key = category.trim().toLowerCase()
          const owner = seen.get(key)
          if (owner) problems.push(`${label}: category "${category}" is listed under both ${owner} and ${severity}`)
          else seen.set(key, severity)
        }
      }
      if (total === 0) problems.push(`${label}: at least one category is required`)
      if (confidence.kind !== 'tiered') problems.push(`${label}: categorical rules require tiered confidence`)
      return problems
    }
  }
}

function checkConfidence(rule: ThresholdRule): string[] {
  const { confidence } = rule
  if (confidence.kind !== 'tiered') return []
  if (confidence.low <= confidence.medium && confidence.medium <= confidence.high) return []
  return [`rule "${rule.id}": tiered confidence must not decrease with severity`]
}

// ---------------------------------------------------------------------------
// Compile
// ---------------------------------------------------------------------------

/**
 * Validates a rule table and freezes it for unsynchronized shared reads.
 * Every problem found is reported together in one CatalogConfigError.
 */
export function compileCatalog(
  input: unknown,
  version: string = DEFAULT_CATALOG_VERSION
): CompiledCatalog {
  // Overrides may come from JSON
  if (!Array.isArray(input)) throw new CatalogConfigError(['catalog must be an array of rules'])
  const rules: readonly unknown[] = input

  const problems: string[] = []
  const compiled: CompiledRule[] = []
  const ids = new Set<string>()

  if (rules.length === 0) problems.push('catalog must contain at least one rule')

  rules.forEach((candidate, index) => {
    if (!Value.Check(ThresholdRule, candidate)) {
      const errors = [...Value.Errors(ThresholdRule, candidate)]
        .slice(0, MAX_SCHEMA_ERRORS_PER_RULE)
        .map((e) => `${e.path || '/'} ${e.message}`)
      problems.push(`rule #${index}: ${errors.join(', ')}`)
      return
    }

    const rule = candidate
    if (ids.has(rule.id)) problems.push(`rule "${rule.id}": duplicate id`)
    ids.add(rule.id)
    problems.push(...checkRule(rule), ...checkConfidence(rule))

    compiled.push(
      deepFreeze({
        ...structuredClone(rule),
        index,
        paths: [rule.metric, ...(rule.aliases ?? [])],
        contextPaths: [...(rule.context ?? [])],
        valueType: rule.predicate.kind === 'categorical' ? 'string' : 'number',
      } satisfies CompiledRule)
    )
  })

  const pathTypes = new Map<string, CompiledRule>()
  for (const rule of compiled) {
    for (const path of rule.paths) {
      const owner = pathTypes.get(path)
      if (!owner) pathTypes.set(path, rule)
      else if (owner.valueType !== rule.valueType) {
        problems.push(`rule "${rule.id}": path "${path}" is read as ${rule.valueType} but rule "${owner.id}" reads it as ${owner.valueType}`)
      }
    }
  }

  if (problems.length > 0) throw new CatalogConfigError(problems)

  return deepFreeze({ version, rules: compiled })
}

export const DEFAULT_CATALOG: CompiledCatalog = compileCatalog(DEFAULT_RULES)

// ---------------------------------------------------------------------------
// Lookups
// ---------------------------------------------------------------------------
export function listThreats(catalog: CompiledCatalog = DEFAULT_CATALOG): ThreatId[] {
  return [...new Set(catalog.rules.map((r) => r.threat))]
}

export function getRulesForThreat(
  threat: ThreatId,
  catalog: CompiledCatalog = DEFAULT_CATALOG
): CompiledRule[] {
  return catalog.rules.filter((r) => r.threat === threat)
}

/** Metric paths (including aliases) that feed a threat's rules */
export function getMetricsForThreat(
  threat: ThreatId,
  catalog: CompiledCatalog = DEFAULT_CATALOG
): string[] {
  return [...new Set(getRulesForThreat(threat, catalog).flatMap((r) => r.paths))]
}

/** Value type each rule-read path must hold; feeds the sanitizer's type checks */
export function expectedMetricTypes(catalog: CompiledCatalog = DEFAULT_CATALOG): ReadonlyMap<string, MetricValueType> {
  const expectations = new Map<string, MetricValueType>()
  for (const rule of catalog.rules) {
    for (const path of rule.paths) {
      if (!expectations.has(path)) expectations.set(path, rule.valueType)
    }
  }
  return expectations
}
