/**
 * Governance Engine: entry point
 *
 * Runs one evaluation as a straight pipeline:
 *   raw metrics → sanitized snapshot → rule outcomes → risk summary → envelope
 *
 * Pure and synchronous. The compiled catalog is shared read-only between
 * calls; nothing else outlives a call. Only configuration defects and
 * caller contract violations throw. Missing or invalid metric values
 * become uncertainty notes on the result.
 */

import { Value } from '@sinclair/typebox/value'
import { aggregateRisk } from '../aggregation/aggregator.js'
import { compileCatalog, DEFAULT_CATALOG, expectedMetricTypes } from '../catalog/compile.js'
import type { CompiledCatalog, MetricValueType } from '../catalog/compile.js'
import { InputContractError } from '../errors/errors.js'
import { mapThreats } from '../mapping/mapper.js'
import { assembleResult, ENGINE_VERSION } from '../result/assembler.js'
import type { GovernanceResult } from '../result/result.js'
import { isPlainObject, sanitizeMetrics } from '../sanitize/sanitizer.js'
import { OutputMode } from '../threat/enums.js'
import { emitAudit } from './audit.js'
import type { AuditSink } from './audit.js'
import { resolveSettings } from './config.js'
import type { EngineSettings, ResolvedSettings } from './config.js'

/** Version label echoed for an override catalog that names none */
export const CUSTOM_CATALOG_VERSION = 'custom'

export interface EngineOptions extends EngineSettings {
  /** Replacement rule table; validated once, when the engine is created */
  catalog?: readonly unknown[]
  clock?: () => Date
  audit?: AuditSink
}

export interface EvaluateOverrides {
  mode?: OutputMode
}

export interface GovernanceEngine {
  readonly catalog: CompiledCatalog
  readonly settings: Readonly<ResolvedSettings>
  evaluate(metrics: unknown, overrides?: EvaluateOverrides): GovernanceResult
}

function describeInput(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'an array'
  if (typeof value === 'object') return `an instance of ${value.constructor?.name ?? 'an unknown class'}`
  return `a ${typeof value}`
}

function assertMetricRoot(metrics: unknown): asserts metrics is Record<string, unknown> {
  if (!isPlainObject(metrics)) {
    throw new InputContractError(
      `Metrics must be a plain object mapping metric names to values, received ${describeInput(metrics)}`,
      { received: describeInput(metrics) }
    )
  }
}

function resolveMode(override: unknown, fallback: OutputMode): OutputMode {
  if (override === undefined) return fallback
  if (Value.Check(OutputMode, override)) return override
  throw new InputContractError(
    `Unknown output mode "${String(override)}"; expected one of summary, detailed, full`,
    { mode: String(override) }
  )
}

/**
 * Builds an engine. The catalog and settings are validated here, so a
 * malformed configuration fails before the first evaluation.
 * @throws CatalogConfigError | ConfigurationError
 */
export function createGovernanceEngine(options: EngineOptions = {}): GovernanceEngine {
  const { catalog: rules, clock, audit, ...rawSettings } = options
  const settings = Object.freeze(resolveSettings(rawSettings))
  const catalog = rules ? compileCatalog(rules, settings.catalog_version ?? CUSTOM_CATALOG_VERSION) : DEFAULT_CATALOG
  const expectations: ReadonlyMap<string, MetricValueType> = expectedMetricTypes(catalog)
  const priorities: ReadonlyMap<string, number> = new Map(
    catalog.rules.map((r): [string, number] => [r.id, r.priority])
  )
  const now = clock ?? (() => new Date())

  function evaluate(metrics: unknown, overrides: EvaluateOverrides = {}): GovernanceResult {
    assertMetricRoot(metrics)
    const mode = resolveMode(overrides.mode, settings.mode)

    const { snapshot, issues } = sanitizeMetrics(metrics, expectations)
    const mapping = mapThreats(snapshot, catalog)
    const aggregation = aggregateRisk({
      signals: mapping.signals,
      unresolved: mapping.unresolved,
      evaluated: mapping.evaluated,
      issues,
      topThreatsLimit: settings.top_threats_limit,
      priorities,
    })

    const result = assembleResult({
      aggregation,
      signals: mapping.signals,
      mode,
      evidenceLimit: settings.evidence_limit,
      topThreatsLimit: settings.top_threats_limit,
      catalog: { version: catalog.version, ruleCount: catalog.rules.length },
      timestamp: now(),
    })

    if (audit) {
      emitAudit(audit, {
        timestamp: result.metadata.timestamp,
        engine_version: ENGINE_VERSION,
        mode,
        overall_risk_level: result.dataset_risk_summary.overall_risk_level,
        threat_ids: [...new Set(mapping.signals.map((s) => s.threat_name))],
        has_uncertainty: result.has_uncertainty,
        unresolved_rules: mapping.unresolved.length,
      })
    }

    return result
  }

  return Object.freeze({ catalog, settings, evaluate })
}

const defaultEngine = createGovernanceEngine()

/**
 * Evaluates a metric mapping with the default catalog.
 * Options other than `mode` build a dedicated engine for the call.
 */
export function evaluateGovernance(metrics: unknown, options: EngineOptions = {}): GovernanceResult {
  const { mode, ...rest } = options
  const engine = Object.keys(rest).length === 0 ? defaultEngine : createGovernanceEngine(options)
  return engine.evaluate(metrics, { mode })
}
