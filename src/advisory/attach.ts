/**
 * Advisory attachment
 *
 * Sits outside the core: the structured result is computed first and is
 * returned unchanged whatever the provider does. The provider's text lands
 * in a separate `advisory` field only.
 */

import type { GovernanceResult } from '../result/result.js'
import { projectSummary } from './provider.js'
import type { AdvisoryProvider } from './provider.js'

export const DEFAULT_ADVISORY_TIMEOUT_MS = 10_000

export type AdvisoryStatus = 'ok' | 'timeout' | 'error'

export interface AdvisoryNote {
  status: AdvisoryStatus
  provider: string
  text: string | null
  error?: string
}

export type AdvisedResult = GovernanceResult & { readonly advisory: AdvisoryNote }

export interface AdvisoryOptions {
  timeoutMs?: number
}

class AdvisoryTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Advisory generation exceeded ${timeoutMs}ms`)
    this.name = 'AdvisoryTimeoutError'
  }
}

export async function withAdvisory(
  result: GovernanceResult,
  provider: AdvisoryProvider,
  options: AdvisoryOptions = {}
): Promise<AdvisedResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_ADVISORY_TIMEOUT_MS
  const controller = new AbortController()
  let timer: ReturnType<typeof setTimeout> | undefined

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      reject(new AdvisoryTimeoutError(timeoutMs))
    }, timeoutMs)
  })

  // Sync throws from the provider become rejections
  const generation = Promise.resolve().then(() =>
    provider.generate(projectSummary(result), { signal: controller.signal })
  )

  let advisory: AdvisoryNote
  try {
    const text = await Promise.race([generation, timeout])
    const trimmed = text.trim()
    advisory = trimmed
      ? { status: 'ok', provider: provider.name, text: trimmed }
      : { status: 'error', provider: provider.name, text: null, error: 'Provider returned empty text' }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    const status: AdvisoryStatus = err instanceof AdvisoryTimeoutError ? 'timeout' : 'error'
    console.warn(`[governance][advisory] ${provider.name} ${status}: ${message}`)
    advisory = { status, provider: provider.name, text: null, error: message }

    if (status === 'timeout') {
      generation.catch((late: unknown) => {
        const lateMessage = late instanceof Error ? late.message : String(late)
        console.warn(`[governance][advisory] ${provider.name} settled after timeout: ${lateMessage}`)
      })
    }
  } finally {
    clearTimeout(timer)
  }

  return Object.freeze({ ...result, advisory: Object.freeze(advisory) })
}
