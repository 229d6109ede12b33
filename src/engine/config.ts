import { Type, Static } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import { DEFAULT_TOP_THREATS_LIMIT } from '../aggregation/aggregator.js'
import { ConfigurationError } from '../errors/errors.js'
import { DEFAULT_EVIDENCE_LIMIT } from '../result/assembler.js'
import { OutputMode } from '../threat/enums.js'

export const MAX_LIST_LIMIT = 50

/** Serializable engine settings; everything else on EngineOptions is code */
export const EngineSettings = Type.Object({
  mode: Type.Optional(OutputMode),
  top_threats_limit: Type.Optional(Type.Integer({ minimum: 1, maximum: MAX_LIST_LIMIT })),
  evidence_limit: Type.Optional(Type.Integer({ minimum: 1, maximum: MAX_LIST_LIMIT })),
  catalog_version: Type.Optional(Type.String({ minLength: 1 })),
}, { $id: 'EngineSettings', description: 'Engine configuration knobs.', additionalProperties: false })

export type EngineSettings = Static<typeof EngineSettings>

export type ResolvedSettings = Required<Omit<EngineSettings, 'catalog_version'>> & {
  catalog_version: string | undefined
}

/** Environment variable consulted for each setting by settingsFromEnv */
export const SETTINGS_ENV: Record<keyof EngineSettings, string> = {
  mode: 'GOVERNANCE_OUTPUT_MODE',
  top_threats_limit: 'GOVERNANCE_TOP_THREATS',
  evidence_limit: 'GOVERNANCE_EVIDENCE_LIMIT',
  catalog_version: 'GOVERNANCE_CATALOG_VERSION',
}

function describeErrors(settings: unknown): string[] {
  return [...Value.Errors(EngineSettings, settings)].map((e) => `${e.path || '/'} ${e.message}`)
}

/**
 * Validates settings and fills defaults.
 * @throws ConfigurationError listing every invalid field
 */
export function resolveSettings(settings: unknown = {}): ResolvedSettings {
  if (!Value.Check(EngineSettings, settings)) {
    const problems = describeErrors(settings)
    throw new ConfigurationError(`Invalid engine settings: ${problems.join('; ')}`, { problems })
  }
  return {
    mode: settings.mode ?? 'summary',
    top_threats_limit: settings.top_threats_limit ?? DEFAULT_TOP_THREATS_LIMIT,
    evidence_limit: settings.evidence_limit ?? DEFAULT_EVIDENCE_LIMIT,
    catalog_version: settings.catalog_version,
  }
}

/** Reads settings from environment variables; numeric strings are converted. */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): EngineSettings {
  const raw: Record<string, string> = {}
  for (const [key, variable] of Object.entries(SETTINGS_ENV)) {
    const value = env[variable]?.trim()
    if (value) raw[key] = value
  }

  const converted = Value.Convert(EngineSettings, raw)
  if (!Value.Check(EngineSettings, converted)) {
    const problems = describeErrors(converted)
    throw new ConfigurationError(`Invalid engine settings in environment: ${problems.join('; ')}`, { problems })
  }
  return converted
}
