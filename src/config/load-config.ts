import {cosmiconfig} from 'cosmiconfig'
import dotenv from 'dotenv'
import {appConfigSchema, type AppConfig} from './schema.js'
import {getGlobalEnvPath} from './paths.js'

dotenv.config({path: getGlobalEnvPath()})
dotenv.config()

const VENDOR_KEY_ENV: Record<string, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  deepseek: 'DEEPSEEK_API_KEY',
  openai: 'OPENAI_API_KEY'
}

function nonEmpty(value?: string): string | undefined {
  if (!value) return undefined
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}

function positiveIntFromEnv(name: string): number | undefined {
  const parsed = Number.parseInt(process.env[name] ?? '', 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined
}

function asRecord(value: unknown): Record<string, unknown> {
  return value && typeof value === 'object' && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : {}
}

/** Credentials come from the environment here and nowhere else. */
export function apiKeyFromEnv(provider: string): string | undefined {
  const explicit = nonEmpty(process.env.CODELOOM_API_KEY)
  if (explicit) return explicit
  const vendorEnv = VENDOR_KEY_ENV[provider] ?? VENDOR_KEY_ENV.openai
  return nonEmpty(process.env[vendorEnv])
}

export async function loadConfig(searchFrom?: string): Promise<AppConfig> {
  const explorer = cosmiconfig('codeloom')
  const result = await explorer.search(searchFrom)
  const base = asRecord(result?.config)
  const baseRuntime = asRecord(base.runtime)

  const provider = nonEmpty(process.env.CODELOOM_PROVIDER) ?? base.provider
  const providerName = typeof provider === 'string' ? provider.trim().toLowerCase() : 'openai'

  const merged: Record<string, unknown> = {
    ...base,
    provider,
    model: nonEmpty(process.env.CODELOOM_MODEL) ?? base.model,
    baseURL: nonEmpty(process.env.CODELOOM_BASE_URL) ?? base.baseURL,
    apiKey: apiKeyFromEnv(providerName) ?? base.apiKey,
    maxContext: positiveIntFromEnv('CODELOOM_MAX_CONTEXT') ?? base.maxContext,
    maxOutputTokens: positiveIntFromEnv('CODELOOM_MAX_OUTPUT_TOKENS') ?? base.maxOutputTokens,
    runtime: {
      ...baseRuntime,
      ...(positiveIntFromEnv('CODELOOM_MODEL_TIMEOUT_MS')
        ? {modelTimeoutMs: positiveIntFromEnv('CODELOOM_MODEL_TIMEOUT_MS')}
        : {}),
      ...(positiveIntFromEnv('CODELOOM_MAX_STEPS') ? {maxSteps: positiveIntFromEnv('CODELOOM_MAX_STEPS')} : {}),
      ...(positiveIntFromEnv('CODELOOM_COMPILE_CHECK_TIMEOUT_MS')
        ? {compileCheckTimeoutMs: positiveIntFromEnv('CODELOOM_COMPILE_CHECK_TIMEOUT_MS')}
        : {})
    }
  }

  return appConfigSchema.parse(merged)
}

export function maskSecret(value?: string): string | undefined {
  if (!value) return undefined
  return value.length <= 8 ? '********' : `${value.slice(0, 4)}...${value.slice(-2)}`
}
