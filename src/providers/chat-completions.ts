import OpenAI from 'openai'
import type {ChatCompletion, ChatCompletionTool} from 'openai/resources/chat/completions'
import {z} from 'zod'
import {
  ApiError,
  InferenceError,
  InvalidResponseError,
  MissingApiKeyError,
  NetworkError,
  SerializationError,
  errorMessage
} from '../core/errors.js'
import type {ContentItem, JsonValue, ModelResponse, ToolSpec} from '../core/messages.js'
import type {ErrorBodyCapture} from './error-body-capture.js'
import type {ProviderOptions} from './types.js'

// Only the fields the runtime reads; vendors add plenty of their own.
const contentPartSchema = z.object({type: z.string().optional(), text: z.string().optional()}).passthrough()

const toolCallSchema = z.object({
  id: z.string(),
  type: z.string(),
  function: z.object({name: z.string(), arguments: z.string().default('')}).optional()
})

const chatCompletionSchema = z.object({
  id: z.string().default(''),
  model: z.string().default(''),
  choices: z
    .array(
      z.object({
        finish_reason: z.string().nullish(),
        text: z.string().nullish(),
        message: z
          .object({
            role: z.string().default('assistant'),
            content: z.union([z.string(), z.array(z.union([z.string(), contentPartSchema]))]).nullish(),
            tool_calls: z.array(toolCallSchema).nullish()
          })
          .optional()
      })
    )
    .min(1)
})

type ChatChoice = z.infer<typeof chatCompletionSchema>['choices'][number]

export function safeJsonSnippet(value: unknown): string {
  try {
    return (JSON.stringify(value) ?? String(value)).slice(0, 500)
  } catch {
    return '[unserializable response]'
  }
}

export function createChatCompletionsClient(
  provider: string,
  options: ProviderOptions,
  defaultBaseUrl: string,
  capture: ErrorBodyCapture
): OpenAI {
  if (!options.apiKey) throw new MissingApiKeyError(provider)
  const rawBaseUrl = options.baseUrl ?? defaultBaseUrl
  return new OpenAI({
    apiKey: options.apiKey,
    baseURL: rawBaseUrl.replace(/\/+$/, ''),
    timeout: options.timeoutMs ?? 45_000,
    maxRetries: 0,
    fetch: capture.wrap(options.fetch)
  })
}

export function toChatCompletionTools(tools: readonly ToolSpec[]): ChatCompletionTool[] {
  return tools.map((tool) => ({
    type: 'function' as const,
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.parameterSchema
    }
  }))
}

export function serializeToolArguments(provider: string, input: JsonValue): string {
  try {
    return JSON.stringify(input)
  } catch (error) {
    throw new SerializationError(provider, `could not encode tool arguments: ${errorMessage(error)}`, {cause: error})
  }
}

function parseToolArguments(provider: string, name: string, raw: string): JsonValue {
  if (!raw.trim()) return {}
  try {
    return JSON.parse(raw)
  } catch (error) {
    throw new SerializationError(
      provider,
      `failed to parse arguments of tool '${name}': ${errorMessage(error)}`,
      {cause: error}
    )
  }
}

function choiceContent(provider: string, choice: ChatChoice): ContentItem[] {
  const content: ContentItem[] = []
  const messageContent = choice.message?.content
  if (typeof messageContent === 'string') {
    if (messageContent) content.push({type: 'text', text: messageContent})
  } else if (Array.isArray(messageContent)) {
    for (const part of messageContent) {
      const text = typeof part === 'string' ? part : part.text
      if (text) content.push({type: 'text', text})
    }
  } else if (choice.text) {
    content.push({type: 'text', text: choice.text})
  }

  for (const call of choice.message?.tool_calls ?? []) {
    if (call.type !== 'function' || !call.function) continue
    content.push({
      type: 'tool_use',
      id: call.id,
      name: call.function.name,
      input: parseToolArguments(provider, call.function.name, call.function.arguments)
    })
  }

  return content
}

/** Maps a Chat Completions body to the vendor-neutral response. */
export function fromChatCompletion(provider: string, completion: ChatCompletion): ModelResponse {
  const parsed = chatCompletionSchema.safeParse(completion)
  if (!parsed.success) {
    throw new InvalidResponseError(
      provider,
      `unexpected completion payload (${parsed.error.issues[0]?.message ?? 'invalid shape'}). Response snippet: ${safeJsonSnippet(completion)}`
    )
  }

  const [choice] = parsed.data.choices
  return {
    content: choiceContent(provider, choice),
    id: parsed.data.id,
    model: parsed.data.model,
    role: choice.message?.role ?? 'assistant',
    stopReason: choice.finish_reason ?? null,
    stopSequence: null
  }
}

export function apiErrorBody(payload: unknown, fallback: string): string {
  if (payload === undefined || payload === null) return fallback
  if (typeof payload === 'string') return payload
  try {
    return JSON.stringify(payload)
  } catch {
    return fallback
  }
}

/** `rawBody` is the vendor's response text, when the transport captured it. */
export function toInferenceError(provider: string, error: unknown, rawBody?: string): InferenceError {
  if (error instanceof InferenceError) return error
  if (error instanceof OpenAI.APIConnectionError) {
    return new NetworkError(provider, errorMessage(error.cause ?? error), {cause: error})
  }
  if (error instanceof OpenAI.APIError) {
    if (typeof error.status === 'number') {
      return new ApiError(provider, error.status, rawBody ?? apiErrorBody(error.error, error.message), {cause: error})
    }
    return new NetworkError(provider, error.message, {cause: error})
  }
  if (error instanceof SyntaxError) {
    return new InvalidResponseError(provider, error.message, {cause: error})
  }
  return new NetworkError(provider, errorMessage(error), {cause: error})
}
