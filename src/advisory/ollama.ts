import { buildAdvisoryPrompt } from './provider.js'
import type { AdvisoryProjection, AdvisoryProvider, AdvisoryRequestOptions } from './provider.js'

export interface OllamaProviderOptions {
  model?: string
  baseUrl?: string
  /** Sampling temperature; low keeps explanations repeatable */
  temperature?: number
  fetch?: typeof fetch
}

export const DEFAULT_OLLAMA_MODEL = 'llama3.1:8b'
export const DEFAULT_OLLAMA_URL = 'http://localhost:11434'

function hasResponseText(body: unknown): body is { response: string } {
  return typeof body === 'object' && body !== null && 'response' in body && typeof body.response === 'string'
}

/** Local Ollama backend: POST /api/generate with streaming disabled */
export class OllamaAdvisoryProvider implements AdvisoryProvider {
  readonly name = 'ollama'
  private readonly model: string
  private readonly baseUrl: string
  private readonly temperature: number
  private readonly fetchImpl: typeof fetch

  constructor(options: OllamaProviderOptions = {}) {
    this.model = options.model ?? process.env.OLLAMA_MODEL ?? DEFAULT_OLLAMA_MODEL
    this.baseUrl = (options.baseUrl ?? process.env.OLLAMA_BASE_URL ?? DEFAULT_OLLAMA_URL).replace(/\/+$/, '')
    this.temperature = options.temperature ?? 0.1
    this.fetchImpl = options.fetch ?? fetch
  }

  async generate(projection: AdvisoryProjection, { signal }: AdvisoryRequestOptions): Promise<string> {
    const resp = await this.fetchImpl(`${this.baseUrl}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        prompt: buildAdvisoryPrompt(projection),
        stream: false,
        options: { temperature: this.temperature },
      }),
      signal,
    })

    if (!resp.ok) {
      const text = await resp.text()
      throw new Error(`Ollama error: ${resp.status} ${text}`)
    }

    const body: unknown = await resp.json()
    if (!hasResponseText(body) || !body.response.trim()) throw new Error('Empty completion')
    return body.response.trim()
  }
}
