import type { DatasetRiskSummary } from '../aggregation/summary.js'
import type { GovernanceResult } from '../result/result.js'
import { deepFreeze } from '../util/freeze.js'

/** Read-only view of a result handed to a text-generation backend */
export interface AdvisoryProjection {
  readonly dataset_risk_summary: Readonly<DatasetRiskSummary>
  readonly has_uncertainty: boolean
}

export interface AdvisoryRequestOptions {
  signal: AbortSignal
}

/** Any backend that turns a risk summary into free text */
export interface AdvisoryProvider {
  readonly name: string
  generate(projection: AdvisoryProjection, options: AdvisoryRequestOptions): Promise<string>
}

/** Deep copy, so a provider can neither see nor alter the result itself */
export function projectSummary(result: GovernanceResult): AdvisoryProjection {
  return deepFreeze({
    dataset_risk_summary: structuredClone(result.dataset_risk_summary),
    has_uncertainty: result.has_uncertainty,
  })
}

export function buildAdvisoryPrompt(projection: AdvisoryProjection): string {
  const summary = projection.dataset_risk_summary
  const threats = summary.top_threats
    .map((t) => `- ${t.threat_name} (${t.severity}, confidence ${t.confidence}): ${t.triggered_conditions.join('; ')}`)
    .join('\n')

  const lines = [
    'You are reviewing a governance assessment of a synthetic dataset.',
    'Explain the findings below in plain language for a data steward.',
    'The assessment is advisory only: do not approve, reject or recommend deployment.',
    '',
    `Overall risk level: ${summary.overall_risk_level}`,
    `Summary: ${summary.summary}`,
    `Top threats:\n${threats || '- none'}`,
  ]
  if (projection.has_uncertainty) lines.push('Some metrics were missing or invalid; mention the uncertainty.')
  return lines.join('\n')
}
