import type {Message, ModelResponse, ToolSpec} from '../core/messages.js'

export type ProviderName = 'anthropic' | 'openai' | 'deepseek' | 'mock'

export type HttpTransport = typeof fetch

export type ProviderOptions = {
  apiKey?: string
  model: string
  baseUrl?: string
  maxOutputTokens: number
  timeoutMs?: number
  /** Defaults to the full tool catalog. */
  tools?: readonly ToolSpec[]
  /** Defaults to the global fetch. */
  fetch?: HttpTransport
}

/**
 * One vendor backend. `query` rejects with an `InferenceError` subclass and
 * never retries on its own.
 */
export interface LLMProvider {
  readonly name: string
  readonly model: string
  query(messages: readonly Message[], systemMessage?: string): Promise<ModelResponse>
}
