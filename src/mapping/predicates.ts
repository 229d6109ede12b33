import { SEVERITY_ORDER } from '../threat/enums.js'
import type { Severity } from '../threat/enums.js'
import type { CategoricalPredicate, RangePredicate, ThresholdPredicate, TierBoundaries } from '../catalog/rule.js'

export interface PredicateMatch {
  severity: Severity
  /** Distance past the entry (least severe) boundary; drives confidence */
  excess: number
  /** Human-readable condition, with the value embedded verbatim */
  condition: string
}

const OPERATORS: Record<ThresholdPredicate['kind'], string> = {
  gt: '>',
  gte: '>=',
  lt: '<',
}

function crosses(kind: ThresholdPredicate['kind'], value: number, boundary: number): boolean {
  switch (kind) {
    case 'gt':
      return value > boundary
    case 'gte':
      return value >= boundary
    case 'lt':
      return value < boundary
  }
}

/** Boundary of the least severe tier present */
function entryBoundary(boundaries: TierBoundaries): number | undefined {
  return boundaries.low ?? boundaries.medium ?? boundaries.high
}

/** Walks tiers from high to low; the first crossed boundary sets the severity. */
function firstCrossed(
  boundaries: TierBoundaries,
  isCrossed: (boundary: number) => boolean
): [Severity, number] | null {
  for (const severity of SEVERITY_ORDER) {
    const boundary = boundaries[severity]
    if (boundary !== undefined && isCrossed(boundary)) return [severity, boundary]
  }
  return null
}

function formatNumber(value: number): string {
  return String(Number(value.toFixed(6)))
}

export function evaluateThreshold(
  predicate: ThresholdPredicate,
  path: string,
  value: number
): PredicateMatch | null {
  const crossed = firstCrossed(predicate.boundaries, (b) => crosses(predicate.kind, value, b))
  const entry = entryBoundary(predicate.boundaries)
  if (!crossed || entry === undefined) return null

  const [severity, boundary] = crossed
  return {
    severity,
    excess: predicate.kind === 'lt' ? entry - value : value - entry,
    condition: `${path} = ${value} ${OPERATORS[predicate.kind]} ${boundary} (${severity})`,
  }
}

/** Distance from value to the band [min, max]; zero inside the band */
export function rangeDeviation(predicate: RangePredicate, value: number): number {
  if (value < predicate.min) return predicate.min - value
  if (value > predicate.max) return value - predicate.max
  return 0
}

export function evaluateRange(
  predicate: RangePredicate,
  path: string,
  value: number
): PredicateMatch | null {
  const deviation = rangeDeviation(predicate, value)
  const crossed = firstCrossed(predicate.boundaries, (b) => deviation > b)
  const entry = entryBoundary(predicate.boundaries)
  if (!crossed || entry === undefined) return null

  const [severity] = crossed
  return {
    severity,
    excess: deviation - entry,
    condition: `${path} = ${value} outside [${predicate.min}, ${predicate.max}] by ${formatNumber(deviation)} (${severity})`,
  }
}

/** Case-insensitive membership; the most severe matching tier wins */
export function evaluateCategorical(
  predicate: CategoricalPredicate,
  path: string,
  value: string
): PredicateMatch | null {
  const needle = value.trim().toLowerCase()
  for (const severity of SEVERITY_ORDER) {
    const categories = predicate.categories[severity] ?? []
    if (categories.some((c) => c.trim().toLowerCase() === needle)) {
      return {
        severity,
        excess: 0,
        condition: `${path} = "${value}" in [${categories.join(', ')}] (${severity})`,
      }
    }
  }
  return null
}
