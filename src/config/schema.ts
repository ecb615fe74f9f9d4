import {z} from 'zod'
import {getCodeloomHome} from './paths.js'

const positiveInt = z.coerce.number().int().positive()

const optionalText = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().optional()
)

export const appConfigSchema = z.object({
  // Unknown names are accepted here; provider selection falls back to the OpenAI-compatible backend.
  provider: z.string().trim().toLowerCase().default('openai'),
  model: optionalText,
  baseURL: optionalText,
  apiKey: optionalText,
  maxContext: positiveInt.default(32_000),
  maxOutputTokens: positiveInt.default(8096),
  workspace: z.string().default(process.cwd()),
  homeDir: z.string().default(getCodeloomHome()),
  runtime: z
    .object({
      modelTimeoutMs: positiveInt.default(45_000),
      maxSteps: positiveInt.default(16),
      compileCheckTimeoutMs: positiveInt.default(5_000)
    })
    .default({})
})

export type AppConfig = z.infer<typeof appConfigSchema>
