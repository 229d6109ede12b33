/**
 * Risk Aggregator
 *
 * Folds the signals of one evaluation into a dataset-level summary:
 * severity and property breakdowns, an escalation-derived risk level,
 * ranked top threats and the uncertainty notes.
 */

import type { SanitizationIssue } from '../sanitize/sanitizer.js'
import type { UnresolvedOutcome } from '../mapping/mapper.js'
import { SEVERITY_RANK } from '../threat/enums.js'
import type { RiskLevel } from '../threat/enums.js'
import type { ThreatSignal } from '../threat/signal.js'
import type { ConfidenceStats, DatasetRiskSummary, PropertyBreakdown, SeverityBreakdown } from './summary.js'

export const DEFAULT_TOP_THREATS_LIMIT = 5

export interface AggregationInput {
  /** Signals in catalog order */
  signals: readonly ThreatSignal[]
  unresolved: readonly UnresolvedOutcome[]
  /** Rules that read a usable value, triggered or clear */
  evaluated: number
  issues: readonly SanitizationIssue[]
  topThreatsLimit?: number
  /** Priority weight per rule id; the third ranking key */
  priorities?: ReadonlyMap<string, number>
}

export interface RiskAggregation {
  summary: DatasetRiskSummary
  has_uncertainty: boolean
  uncertainty_notes: string[]
}

// ---------------------------------------------------------------------------
// Escalation rules: evaluated top to bottom, first match wins
// ---------------------------------------------------------------------------
interface EscalationContext {
  breakdown: SeverityBreakdown
  total: number
  evaluated: number
  unresolved: number
}

interface EscalationRule {
  level: RiskLevel
  reason: string
  applies: (ctx: EscalationContext) => boolean
}

export const ESCALATION_RULES: readonly EscalationRule[] = [
  {
    level: 'low',
    reason: 'No threats detected',
    applies: (ctx) => ctx.total === 0 && ctx.unresolved === 0,
  },
  {
    level: 'unknown',
    reason: 'Insufficient data to evaluate any threat',
    applies: (ctx) => ctx.total === 0 && ctx.evaluated === 0 && ctx.unresolved > 0,
  },
  {
    level: 'low',
    reason: 'No threats detected among the rules that could be evaluated',
    applies: (ctx) => ctx.total === 0,
  },
  {
    level: 'critical',
    reason: 'High severity threat detected',
    applies: (ctx) => ctx.breakdown.high > 0,
  },
  {
    level: 'warning',
    reason: 'Medium severity threat detected',
    applies: (ctx) => ctx.breakdown.medium > 0,
  },
  {
    level: 'low',
    reason: 'Only low severity threats detected',
    applies: () => true,
  },
]

const LEVEL_LABELS: Record<RiskLevel, string> = {
  low: 'Low risk',
  warning: 'Warning',
  critical: 'Critical risk',
  unknown: 'Risk unknown',
}

const LEVEL_DESCRIPTIONS: Record<RiskLevel, string> = {
  critical: 'Critical risk requiring immediate attention. The dataset may pose significant privacy or governance concerns.',
  warning: 'Elevated risk detected. Review is recommended before the dataset is shared or used.',
  low: 'Low risk profile. Standard monitoring and governance practices apply.',
  unknown: 'Risk could not be determined because the supplied metrics were missing or invalid.',
}

export function describeRiskLevel(level: RiskLevel): string {
  return LEVEL_DESCRIPTIONS[level]
}

export function explainEscalationRules(): { level: RiskLevel; reason: string }[] {
  return ESCALATION_RULES.map(({ level, reason }) => ({ level, reason }))
}

function escalate(ctx: EscalationContext): EscalationRule {
  const rule = ESCALATION_RULES.find((r) => r.applies(ctx))
  // The final rule always applies
  return rule ?? ESCALATION_RULES[ESCALATION_RULES.length - 1]
}

// ---------------------------------------------------------------------------
// Breakdowns
// ---------------------------------------------------------------------------
function severityBreakdown(signals: readonly ThreatSignal[]): SeverityBreakdown {
  const breakdown: SeverityBreakdown = { high: 0, medium: 0, low: 0 }
  for (const s of signals) breakdown[s.severity]++
  return breakdown
}

function propertyBreakdown(signals: readonly ThreatSignal[]): PropertyBreakdown {
  const breakdown: PropertyBreakdown = { privacy: 0, utility: 0, consistency: 0 }
  for (const s of signals) breakdown[s.impacted_property]++
  return breakdown
}

function round3(value: number): number {
  return Math.round((value + Number.EPSILON) * 1000) / 1000
}

function confidenceStats(signals: readonly ThreatSignal[]): ConfidenceStats {
  if (signals.length === 0) return { avg: 0, max: 0, min: 0 }
  const values = signals.map((s) => s.confidence)
  return {
    avg: round3(values.reduce((sum, v) => sum + v, 0) / values.length),
    max: round3(Math.max(...values)),
    min: round3(Math.min(...values)),
  }
}

// ---------------------------------------------------------------------------
// Ranking
// ---------------------------------------------------------------------------

/**
 * Severity desc, confidence desc, priority desc, then catalog order.
 * Input order is catalog order, so the position is the final key.
 */
export function rankThreats(
  signals: readonly ThreatSignal[],
  limit: number,
  priorities: ReadonlyMap<string, number> = new Map()
): ThreatSignal[] {
  return signals
    .map((signal, position) => ({ signal, position, priority: priorities.get(signal.rule_id) ?? 0 }))
    .sort((a, b) =>
      SEVERITY_RANK[b.signal.severity] - SEVERITY_RANK[a.signal.severity] ||
      b.signal.confidence - a.signal.confidence ||
      b.priority - a.priority ||
      a.position - b.position
    )
    .slice(0, Math.max(0, limit))
    .map((entry) => entry.signal)
}

function buildSummaryText(
  level: RiskLevel,
  breakdown: SeverityBreakdown,
  total: number,
  topThreats: readonly ThreatSignal[],
  unresolved: number
): string {
  const label = LEVEL_LABELS[level]
  const parts: string[] = []

  if (total === 0) {
    parts.push(`${label}: no threat signals detected.`)
  } else {
    parts.push(
      `${label}: ${total} threat signal(s) detected (${breakdown.high} high, ${breakdown.medium} medium, ${breakdown.low} low).`
    )
    const dominant = [...new Set(topThreats.map((t) => t.threat_name))]
    parts.push(`Dominant threats: ${dominant.join(', ')}.`)
  }
  if (unresolved > 0) parts.push(`${unresolved} rule(s) could not be evaluated.`)

  return parts.join(' ')
}

// ---------------------------------------------------------------------------
// Aggregate
// ---------------------------------------------------------------------------
export function aggregateRisk(input: AggregationInput): RiskAggregation {
  const { signals, unresolved, evaluated, issues } = input
  const limit = input.topThreatsLimit ?? DEFAULT_TOP_THREATS_LIMIT

  const breakdown = severityBreakdown(signals)
  const escalation = escalate({ breakdown, total: signals.length, evaluated, unresolved: unresolved.length })
  const topThreats = rankThreats(signals, limit, input.priorities)

  const uncertainty_notes = [
    ...unresolved.map((u) => u.note),
    ...issues.map((i) => i.message),
  ]

  return {
    summary: {
      overall_risk_level: escalation.level,
      total_threats: signals.length,
      severity_breakdown: breakdown,
      property_breakdown: propertyBreakdown(signals),
      top_threats: topThreats,
      escalation_reason: escalation.reason,
      confidence_stats: confidenceStats(signals),
      summary: buildSummaryText(escalation.level, breakdown, signals.length, topThreats, unresolved.length),
    },
    has_uncertainty: uncertainty_notes.length > 0,
    uncertainty_notes,
  }
}
