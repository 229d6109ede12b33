import { Type, Static } from '@sinclair/typebox'
import { OutputMode, RiskLevel, ThreatId } from '../threat/enums.js'

export const AuditEntry = Type.Object({
  timestamp: Type.String({ format: 'date-time' }),
  engine_version: Type.String(),
  mode: OutputMode,
  overall_risk_level: RiskLevel,
  threat_ids: Type.Array(ThreatId),
  has_uncertainty: Type.Boolean(),
  unresolved_rules: Type.Integer({ minimum: 0 }),
}, { $id: 'AuditEntry', description: 'Trail record handed to an audit sink after each evaluation.', additionalProperties: false })

export type AuditEntry = Static<typeof AuditEntry>

/** External sink invoked at the engine boundary, after the result is built */
export interface AuditSink {
  record(entry: AuditEntry): void
}

/** Keeps entries in process; useful for tests and short-lived tools */
export class MemoryAuditSink implements AuditSink {
  readonly entries: AuditEntry[] = []

  record(entry: AuditEntry): void {
    this.entries.push(entry)
  }
}

/** A failing sink is logged; the evaluation result is never affected. */
export function emitAudit(sink: AuditSink, entry: AuditEntry): void {
  try {
    sink.record(entry)
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    console.error('[governance][audit] Failed to record evaluation:', message)
  }
}
