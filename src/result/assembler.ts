/**
 * Result Assembler
 *
 * Shapes already-derived data into the outward envelope for the requested
 * output mode. No computation happens here beyond truncation and copying.
 */

import type { RiskAggregation } from '../aggregation/aggregator.js'
import type { OutputMode } from '../threat/enums.js'
import type { ThreatSignal } from '../threat/signal.js'
import { deepFreeze } from '../util/freeze.js'
import type { GovernanceResult } from './result.js'

export const ENGINE_VERSION = '2.1.0'

export const DEFAULT_EVIDENCE_LIMIT = 2

export const DISCLAIMERS: readonly string[] = Object.freeze([
  'This assessment is advisory only and does not constitute compliance certification.',
  'Risk levels are interpretive and should inform, not replace, human decision-making.',
  'No approval or rejection decisions are made by this system.',
])

export interface AssemblyInput {
  aggregation: RiskAggregation
  /** Every signal of the evaluation, in catalog order */
  signals: readonly ThreatSignal[]
  mode: OutputMode
  evidenceLimit: number
  topThreatsLimit: number
  catalog: { version: string; ruleCount: number }
  timestamp: Date
}

/** Full mode keeps complete evidence; other modes keep the first `evidenceLimit` entries. */
export function shapeSignal(signal: ThreatSignal, mode: OutputMode, evidenceLimit: number): ThreatSignal {
  if (mode === 'full') {
    return { ...signal, triggered_conditions: [...signal.triggered_conditions], evidence: { ...signal.evidence } }
  }
  return {
    ...signal,
    triggered_conditions: signal.triggered_conditions.slice(0, evidenceLimit),
    evidence: Object.fromEntries(Object.entries(signal.evidence).slice(0, evidenceLimit)),
  }
}

export function assembleResult(input: AssemblyInput): GovernanceResult {
  const { aggregation, mode, evidenceLimit } = input
  const shape = (signal: ThreatSignal) => shapeSignal(signal, mode, evidenceLimit)

  const result: GovernanceResult = {
    dataset_risk_summary: {
      ...aggregation.summary,
      severity_breakdown: { ...aggregation.summary.severity_breakdown },
      property_breakdown: { ...aggregation.summary.property_breakdown },
      confidence_stats: { ...aggregation.summary.confidence_stats },
      top_threats: aggregation.summary.top_threats.map(shape),
    },
    ...(mode === 'summary' ? {} : { threats: input.signals.map(shape) }),
    has_uncertainty: aggregation.has_uncertainty,
    uncertainty_notes: [...aggregation.uncertainty_notes],
    disclaimers: [...DISCLAIMERS],
    metadata: {
      version: ENGINE_VERSION,
      timestamp: input.timestamp.toISOString(),
      mode,
      config: {
        top_threats_limit: input.topThreatsLimit,
        evidence_limit: evidenceLimit,
        catalog_version: input.catalog.version,
        rule_count: input.catalog.ruleCount,
      },
    },
  }

  return deepFreeze(result)
}
