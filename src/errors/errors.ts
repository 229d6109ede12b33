import type { GovernanceErrorCode, GovernanceErrorPayload } from './payload.js'

/**
 * Base class for the only failures the engine raises: a malformed
 * catalog, invalid engine options, or a caller passing the wrong input
 * shape. Data-quality problems never reach here; they surface as
 * uncertainty notes on the result.
 */
export class GovernanceError extends Error {
  readonly code: GovernanceErrorCode
  readonly details: Record<string, unknown> | undefined

  constructor(code: GovernanceErrorCode, message: string, details?: Record<string, unknown>) {
    super(message)
    this.name = new.target.name
    this.code = code
    this.details = details
  }
}

/** Rule table failed validation; raised before any evaluation runs. */
export class CatalogConfigError extends GovernanceError {
  readonly problems: readonly string[]

  constructor(problems: readonly string[]) {
    super('CATALOG_INVALID', `Threat catalog is invalid: ${problems.join('; ')}`, { problems: [...problems] })
    this.problems = problems
  }
}

export class ConfigurationError extends GovernanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('CONFIG_INVALID', message, details)
  }
}

export class InputContractError extends GovernanceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INPUT_INVALID', message, details)
  }
}

export function toErrorPayload(err: unknown): GovernanceErrorPayload {
  if (err instanceof GovernanceError) {
    return err.details
      ? { code: err.code, message: err.message, details: err.details }
      : { code: err.code, message: err.message }
  }
  const message = err instanceof Error ? err.message : String(err)
  return { code: 'INTERNAL_ERROR', message: message || 'Unknown error' }
}
