import {describe, expect, it} from 'vitest'
import {appConfigSchema} from '../src/config/schema.js'
import {AnthropicProvider} from '../src/providers/anthropic-provider.js'
import {DeepSeekProvider} from '../src/providers/deepseek-provider.js'
import {MockProvider} from '../src/providers/mock-provider.js'
import {OpenAIProvider} from '../src/providers/openai-provider.js'
import {DEFAULT_MODELS, providerFromConfig, resolveModel, resolveProviderName} from '../src/providers/select-provider.js'

describe('provider selection', () => {
  it('falls back to the OpenAI-compatible backend for unknown names', () => {
    expect(resolveProviderName(' Anthropic ')).toBe('anthropic')
    expect(resolveProviderName('deepseek')).toBe('deepseek')
    expect(resolveProviderName('together')).toBe('openai')
  })

  it('uses the configured model or the provider default', () => {
    expect(resolveModel('deepseek', '  ')).toBe(DEFAULT_MODELS.deepseek)
    expect(resolveModel('openai', 'gpt-4.1')).toBe('gpt-4.1')
  })

  it('builds the provider named in config', () => {
    const base = {apiKey: 'test-key', workspace: '/tmp/project', homeDir: '/tmp/home'}
    const anthropic = providerFromConfig(appConfigSchema.parse({...base, provider: 'anthropic'}))
    expect(anthropic).toBeInstanceOf(AnthropicProvider)
    expect(anthropic.model).toBe(DEFAULT_MODELS.anthropic)

    expect(providerFromConfig(appConfigSchema.parse({...base, provider: 'deepseek'}))).toBeInstanceOf(DeepSeekProvider)
    expect(providerFromConfig(appConfigSchema.parse({...base, provider: 'mock'}))).toBeInstanceOf(MockProvider)

    const fallback = providerFromConfig(appConfigSchema.parse({...base, provider: 'together', model: 'mixtral'}))
    expect(fallback).toBeInstanceOf(OpenAIProvider)
    expect(fallback.model).toBe('mixtral')
  })
})
