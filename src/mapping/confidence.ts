import type { ConfidenceFormula } from '../catalog/rule.js'
import type { Severity } from '../threat/enums.js'

function clampUnit(value: number): number {
  if (!Number.isFinite(value) || value < 0) return 0
  if (value > 1) return 1
  return value
}

function round3(value: number): number {
  return Math.round((value + Number.EPSILON) * 1000) / 1000
}

function rawConfidence(formula: ConfidenceFormula, severity: Severity, distance: number): number {
  switch (formula.kind) {
    case 'linear':
      return formula.floor + (1 - formula.floor) * Math.min(distance / formula.scale, 1)
    case 'log':
      return formula.floor + (1 - formula.floor) * Math.min(Math.log10(1 + distance) / formula.decades, 1)
    case 'tiered':
      return formula[severity]
  }
}

/**
 * Strength of evidence for one triggered rule, in [0, 1].
 * Non-decreasing in `excess`, so pushing a metric further past its entry
 * boundary never lowers confidence.
 */
export function computeConfidence(formula: ConfidenceFormula, severity: Severity, excess: number): number {
  return round3(clampUnit(rawConfidence(formula, severity, Math.max(excess, 0))))
}
