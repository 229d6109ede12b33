/**
 * Threat Mapper
 *
 * Generic interpreter for the rule catalog. Each rule is evaluated on its
 * own against the same snapshot, so no rule can influence another rule's
 * severity or confidence; signal order is catalog order.
 */

import type { CompiledCatalog, CompiledRule } from '../catalog/compile.js'
import { isUnavailable } from '../sanitize/sanitizer.js'
import type { MetricSnapshot } from '../sanitize/sanitizer.js'
import type { MetricLiteral, ThreatSignal } from '../threat/signal.js'
import { deepFreeze } from '../util/freeze.js'
import { computeConfidence } from './confidence.js'
import { evaluateCategorical, evaluateRange, evaluateThreshold } from './predicates.js'
import type { PredicateMatch } from './predicates.js'

export type RuleOutcome =
  | { status: 'triggered'; rule: CompiledRule; signal: ThreatSignal }
  | { status: 'clear'; rule: CompiledRule; path: string; value: MetricLiteral }
  | { status: 'not_applicable'; rule: CompiledRule }
  | { status: 'unresolved'; rule: CompiledRule; note: string }

export type UnresolvedOutcome = Extract<RuleOutcome, { status: 'unresolved' }>

export interface ThreatMapping {
  signals: readonly ThreatSignal[]
  /** One outcome per rule, in catalog order */
  outcomes: readonly RuleOutcome[]
  unresolved: readonly UnresolvedOutcome[]
  /** Rules that read a usable value, triggered or clear */
  evaluated: number
}

type Resolution =
  | { kind: 'resolved'; path: string; value: number | string }
  | { kind: 'absent' }
  | { kind: 'invalid' }

function resolveMetric(snapshot: MetricSnapshot, rule: CompiledRule): Resolution {
  let sawInvalid = false
  for (const path of rule.paths) {
    if (!Object.hasOwn(snapshot, path)) continue
    const value = snapshot[path]
    if (isUnavailable(value) || typeof value !== rule.valueType) {
      sawInvalid = true
      continue
    }
    if (typeof value === 'number' || typeof value === 'string') return { kind: 'resolved', path, value }
  }
  return sawInvalid ? { kind: 'invalid' } : { kind: 'absent' }
}

function matchRule(rule: CompiledRule, path: string, value: number | string): PredicateMatch | null {
  const { predicate } = rule
  switch (predicate.kind) {
    case 'categorical':
      return typeof value === 'string' ? evaluateCategorical(predicate, path, value) : null
    case 'range':
      return typeof value === 'number' ? evaluateRange(predicate, path, value) : null
    default:
      return typeof value === 'number' ? evaluateThreshold(predicate, path, value) : null
  }
}

function collectEvidence(
  snapshot: MetricSnapshot,
  rule: CompiledRule,
  path: string,
  value: number | string
): Record<string, MetricLiteral> {
  const evidence: Record<string, MetricLiteral> = { [path]: value }
  for (const contextPath of rule.contextPaths) {
    if (contextPath === path || !Object.hasOwn(snapshot, contextPath)) continue
    const contextValue = snapshot[contextPath]
    if (!isUnavailable(contextValue)) evidence[contextPath] = contextValue
  }
  return evidence
}

export function unresolvedNote(rule: CompiledRule): string {
  return `insufficient data to evaluate ${rule.threat} (${rule.id})`
}

export function evaluateRule(snapshot: MetricSnapshot, rule: CompiledRule): RuleOutcome {
  const resolution = resolveMetric(snapshot, rule)
  if (resolution.kind === 'absent') return { status: 'not_applicable', rule }
  if (resolution.kind === 'invalid') return { status: 'unresolved', rule, note: unresolvedNote(rule) }

  const { path, value } = resolution
  const match = matchRule(rule, path, value)
  if (!match) return { status: 'clear', rule, path, value }

  const signal: ThreatSignal = deepFreeze({
    threat_name: rule.threat,
    rule_id: rule.id,
    title: rule.title,
    impacted_property: rule.impacted_property,
    severity: match.severity,
    confidence: computeConfidence(rule.confidence, match.severity, match.excess),
    triggered_conditions: [match.condition],
    evidence: collectEvidence(snapshot, rule, path, value),
    description: rule.description,
  })
  return { status: 'triggered', rule, signal }
}

/**
 * Evaluates every catalog rule against a sanitized snapshot.
 *
 * A rule whose metrics are all absent is not applicable. When not a single
 * rule could be evaluated, those rules are reported as unresolved instead,
 * since nothing at all is known about the dataset.
 */
export function mapThreats(snapshot: MetricSnapshot, catalog: CompiledCatalog): ThreatMapping {
  let outcomes = catalog.rules.map((rule) => evaluateRule(snapshot, rule))

  const evaluated = outcomes.filter((o) => o.status === 'triggered' || o.status === 'clear').length
  if (evaluated === 0) {
    outcomes = outcomes.map((o): RuleOutcome =>
      o.status === 'not_applicable' ? { status: 'unresolved', rule: o.rule, note: unresolvedNote(o.rule) } : o
    )
  }

  const signals: ThreatSignal[] = []
  const unresolved: UnresolvedOutcome[] = []
  for (const outcome of outcomes) {
    if (outcome.status === 'triggered') signals.push(outcome.signal)
    else if (outcome.status === 'unresolved') unresolved.push(outcome)
  }

  return { signals, outcomes, unresolved, evaluated }
}
