import type {AppConfig} from '../config/schema.js'
import {AnthropicProvider} from './anthropic-provider.js'
import {DeepSeekProvider} from './deepseek-provider.js'
import {MockProvider} from './mock-provider.js'
import {OpenAIProvider} from './openai-provider.js'
import type {HttpTransport, LLMProvider, ProviderName, ProviderOptions} from './types.js'

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  anthropic: 'claude-3-5-sonnet-20241022',
  openai: 'gpt-4o-mini',
  deepseek: 'deepseek-chat',
  mock: 'mock'
}

/** Unrecognised names resolve to the generic OpenAI-compatible backend. */
export function resolveProviderName(name: string): ProviderName {
  switch (name.trim().toLowerCase()) {
    case 'anthropic':
      return 'anthropic'
    case 'deepseek':
      return 'deepseek'
    case 'mock':
      return 'mock'
    default:
      return 'openai'
  }
}

export function resolveModel(name: ProviderName, configModel?: string): string {
  const trimmed = configModel?.trim()
  return trimmed ? trimmed : DEFAULT_MODELS[name]
}

type ProviderConfig = Pick<AppConfig, 'provider' | 'model' | 'baseURL' | 'apiKey' | 'maxOutputTokens'> & {
  runtime: Pick<AppConfig['runtime'], 'modelTimeoutMs'>
}

export function providerFromConfig(config: ProviderConfig, transport?: HttpTransport): LLMProvider {
  const name = resolveProviderName(config.provider)
  const options: ProviderOptions = {
    apiKey: config.apiKey,
    model: resolveModel(name, config.model),
    baseUrl: config.baseURL,
    maxOutputTokens: config.maxOutputTokens,
    timeoutMs: config.runtime.modelTimeoutMs,
    ...(transport ? {fetch: transport} : {})
  }

  switch (name) {
    case 'mock':
      return new MockProvider()
    case 'anthropic':
      return new AnthropicProvider(options)
    case 'deepseek':
      return new DeepSeekProvider(options)
    case 'openai':
      return new OpenAIProvider(options)
  }
}
