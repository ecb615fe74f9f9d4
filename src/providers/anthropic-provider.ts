import Anthropic from '@anthropic-ai/sdk'
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
import type {ContentItem, Message, ModelResponse, ToolSpec} from '../core/messages.js'
import {isJsonValue} from '../core/messages.js'
import {TOOL_CATALOG} from '../tools/catalog.js'
import {apiErrorBody, safeJsonSnippet} from './chat-completions.js'
import {ErrorBodyCapture} from './error-body-capture.js'
import type {LLMProvider, ProviderOptions} from './types.js'

const messageResponseSchema = z.object({
  id: z.string(),
  model: z.string(),
  role: z.string(),
  stop_reason: z.string().nullish(),
  stop_sequence: z.string().nullish(),
  content: z.array(z.object({type: z.string()}).passthrough())
})

function toAnthropicBlocks(content: readonly ContentItem[]): Anthropic.ContentBlockParam[] {
  const blocks: Anthropic.ContentBlockParam[] = []
  for (const item of content) {
    switch (item.type) {
      case 'text':
        // The API rejects empty text blocks.
        if (item.text) blocks.push({type: 'text', text: item.text})
        break
      case 'tool_use':
        blocks.push({type: 'tool_use', id: item.id, name: item.name, input: item.input})
        break
      case 'tool_result':
        blocks.push({type: 'tool_result', tool_use_id: item.toolUseId, content: item.content})
        break
    }
  }
  return blocks
}

function toAnthropicMessage(message: Message): Anthropic.MessageParam {
  return {
    role: message.role === 'assistant' ? 'assistant' : 'user',
    content: toAnthropicBlocks(message.content)
  }
}

function toAnthropicTools(tools: readonly ToolSpec[]): Anthropic.Tool[] {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: tool.parameterSchema
  }))
}

function toInferenceError(provider: string, error: unknown, rawBody?: string): InferenceError {
  if (error instanceof InferenceError) return error
  if (error instanceof Anthropic.APIConnectionError) {
    return new NetworkError(provider, errorMessage(error.cause ?? error), {cause: error})
  }
  if (error instanceof Anthropic.APIError) {
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

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic'
  readonly model: string
  private readonly options: ProviderOptions
  private readonly tools: readonly ToolSpec[]
  private readonly errorBodies = new ErrorBodyCapture()
  private client?: Anthropic

  constructor(options: ProviderOptions) {
    this.options = options
    this.model = options.model
    this.tools = options.tools ?? TOOL_CATALOG
  }

  private getClient(): Anthropic {
    if (!this.options.apiKey) throw new MissingApiKeyError(this.name)
    this.client ??= new Anthropic({
      apiKey: this.options.apiKey,
      ...(this.options.baseUrl ? {baseURL: this.options.baseUrl.replace(/\/+$/, '')} : {}),
      timeout: this.options.timeoutMs ?? 45_000,
      maxRetries: 0,
      fetch: this.errorBodies.wrap(this.options.fetch)
    })
    return this.client
  }

  private toModelResponse(raw: unknown): ModelResponse {
    const parsed = messageResponseSchema.safeParse(raw)
    if (!parsed.success) {
      throw new InvalidResponseError(
        this.name,
        `unexpected message payload (${parsed.error.issues[0]?.message ?? 'invalid shape'}). Response snippet: ${safeJsonSnippet(raw)}`
      )
    }

    const content: ContentItem[] = []
    for (const block of parsed.data.content) {
      if (block.type === 'text' && typeof block.text === 'string') {
        content.push({type: 'text', text: block.text})
        continue
      }
      if (block.type === 'tool_use') {
        const {id, name, input} = block
        if (typeof id !== 'string' || typeof name !== 'string') {
          throw new InvalidResponseError(this.name, `tool_use block without id or name: ${safeJsonSnippet(block)}`)
        }
        if (!isJsonValue(input)) {
          throw new SerializationError(this.name, `input of tool '${name}' is not JSON data`)
        }
        content.push({type: 'tool_use', id, name, input})
      }
      // thinking and server-side blocks have no vendor-neutral counterpart
    }

    return {
      content,
      id: parsed.data.id,
      model: parsed.data.model,
      role: parsed.data.role,
      stopReason: parsed.data.stop_reason ?? null,
      stopSequence: parsed.data.stop_sequence ?? null
    }
  }

  async query(messages: readonly Message[], systemMessage?: string): Promise<ModelResponse> {
    const client = this.getClient()
    const request: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.model,
      max_tokens: this.options.maxOutputTokens,
      // The API rejects messages without content blocks.
      messages: messages.map(toAnthropicMessage).filter((message) => message.content.length > 0),
      ...(systemMessage ? {system: systemMessage} : {}),
      ...(this.tools.length > 0 ? {tools: toAnthropicTools(this.tools)} : {})
    }

    const response = await client.messages.create(request).catch((error: unknown) => {
      throw toInferenceError(this.name, error, this.errorBodies.take())
    })
    return this.toModelResponse(response)
  }
}
