/**
 * Metric Sanitizer
 *
 * Flattens a raw metric mapping into dotted paths and replaces every
 * value that cannot be used with the UNAVAILABLE sentinel. Total: any
 * input yields a snapshot plus the list of issues found on the way.
 */

import type { MetricValueType } from '../catalog/compile.js'

/** Marks a metric that was present but unusable */
export const UNAVAILABLE: unique symbol = Symbol('metric.unavailable')

export type MetricValue = number | string | boolean | typeof UNAVAILABLE

/** Flat, frozen mapping of dotted metric path to value */
export type MetricSnapshot = Readonly<Record<string, MetricValue>>

export type SanitizationIssueReason =
  | 'non_finite'
  | 'null'
  | 'empty_string'
  | 'type_mismatch'
  | 'circular'
  | 'unreadable'

export interface SanitizationIssue {
  path: string
  reason: SanitizationIssueReason
  message: string
}

export interface SanitizedMetrics {
  snapshot: MetricSnapshot
  issues: readonly SanitizationIssue[]
}

type Expectations = ReadonlyMap<string, MetricValueType>

const NO_EXPECTATIONS: Expectations = new Map()

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

export function isUnavailable(value: MetricValue | undefined): value is typeof UNAVAILABLE {
  return value === UNAVAILABLE
}

function describeType(value: unknown): string {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'array'
  return typeof value
}

class SnapshotBuilder {
  readonly entries = new Map<string, MetricValue>()
  readonly issues: SanitizationIssue[] = []

  constructor(private readonly expectations: Expectations) {}

  keep(path: string, value: number | string | boolean): void {
    const expected = this.expectations.get(path)
    if (expected && typeof value !== expected) {
      this.discard(path, 'type_mismatch', `metric ${path} expected ${expected} but received ${typeof value}, treated as missing`)
      return
    }
    this.entries.set(path, value)
  }

  discard(path: string, reason: SanitizationIssueReason, message: string): void {
    this.entries.set(path, UNAVAILABLE)
    this.issues.push({ path, reason, message })
  }

  visit(path: string, value: unknown, ancestors: Set<object>): void {
    if (value === UNAVAILABLE) {
      this.entries.set(path, UNAVAILABLE)
      return
    }

    switch (typeof value) {
      case 'number':
        if (Number.isFinite(value)) this.keep(path, value)
        else this.discard(path, 'non_finite', `metric ${path} was non-finite, value discarded`)
        return

      case 'string':
        if (value.trim() === '') this.discard(path, 'empty_string', `metric ${path} was an empty string, value discarded`)
        else this.keep(path, value)
        return

      case 'boolean':
        this.keep(path, value)
        return
    }

    if (isPlainObject(value)) {
      if (ancestors.has(value)) {
        this.discard(path, 'circular', `metric ${path} is a circular reference, value discarded`)
        return
      }
      ancestors.add(value)
      this.walk(value, path, ancestors)
      ancestors.delete(value)
      return
    }

    // Absent, null or structurally unusable: only worth an issue where a rule reads it
    const expected = this.expectations.get(path)
    if (!expected) return
    if (value === null || value === undefined) {
      this.discard(path, 'null', `metric ${path} was null, value discarded`)
    } else {
      this.discard(path, 'type_mismatch', `metric ${path} expected ${expected} but received ${describeType(value)}, treated as missing`)
    }
  }

  walk(source: Record<string, unknown>, prefix: string, ancestors: Set<object>): void {
    for (const key of Object.keys(source)) {
      const path = prefix ? `${prefix}.${key}` : key
      let value: unknown
      try {
        value = source[key]
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err)
        this.discard(path, 'unreadable', `metric ${path} could not be read (${reason}), value discarded`)
        continue
      }
      this.visit(path, value, ancestors)
    }
  }
}

/**
 * Normalizes a raw metric mapping.
 *
 * `expectations` maps rule-read paths to the value type their rule needs;
 * a value of any other type at such a path is recorded and discarded.
 * The caller's object is only read, and the returned snapshot shares no
 * structure with it. Sanitizing a snapshot again yields the same snapshot
 * and no issues.
 */
export function sanitizeMetrics(
  raw: Readonly<Record<string, unknown>>,
  expectations: Expectations = NO_EXPECTATIONS
): SanitizedMetrics {
  const builder = new SnapshotBuilder(expectations)
  builder.walk(raw, '', new Set<object>([raw]))

  return {
    snapshot: Object.freeze(Object.fromEntries(builder.entries)),
    issues: Object.freeze(builder.issues.map((issue) => Object.freeze(issue))),
  }
}
