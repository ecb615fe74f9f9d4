import type OpenAI from 'openai'
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall
} from 'openai/resources/chat/completions'
import type {Message, ModelResponse, ToolSpec} from '../core/messages.js'
import {textOf} from '../core/messages.js'
import {TOOL_CATALOG} from '../tools/catalog.js'
import {
  createChatCompletionsClient,
  fromChatCompletion,
  serializeToolArguments,
  toChatCompletionTools,
  toInferenceError
} from './chat-completions.js'
import {ErrorBodyCapture} from './error-body-capture.js'
import type {LLMProvider, ProviderOptions} from './types.js'

export type OpenAIProviderOptions = ProviderOptions & {
  /** Reasoning models (o1, o3, ...) take their instructions as a developer message. */
  systemRole?: 'system' | 'developer'
}

export function isReasoningModel(model: string): boolean {
  return /^o\d/.test(model)
}

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai'
  readonly model: string
  private readonly options: OpenAIProviderOptions
  private readonly tools: readonly ToolSpec[]
  private readonly systemRole: 'system' | 'developer'
  private readonly errorBodies = new ErrorBodyCapture()
  private client?: OpenAI

  constructor(options: OpenAIProviderOptions) {
    this.options = options
    this.model = options.model
    this.tools = options.tools ?? TOOL_CATALOG
    this.systemRole = options.systemRole ?? (isReasoningModel(options.model) ? 'developer' : 'system')
  }

  private getClient(): OpenAI {
    this.client ??= createChatCompletionsClient(this.name, this.options, 'https://api.openai.com/v1', this.errorBodies)
    return this.client
  }

  private mapMessages(messages: readonly Message[], systemMessage?: string): ChatCompletionMessageParam[] {
    const mapped: ChatCompletionMessageParam[] = []
    if (systemMessage) {
      mapped.push(
        this.systemRole === 'developer'
          ? {role: 'developer', content: systemMessage}
          : {role: 'system', content: systemMessage}
      )
    }

    for (const message of messages) {
      if (message.role === 'assistant') {
        const toolCalls: ChatCompletionMessageToolCall[] = []
        for (const item of message.content) {
          if (item.type !== 'tool_use') continue
          toolCalls.push({
            id: item.id,
            type: 'function',
            function: {name: item.name, arguments: serializeToolArguments(this.name, item.input)}
          })
        }

        const text = textOf(message.content)
        // A reply with neither text nor tool calls cannot be replayed.
        if (!text && toolCalls.length === 0) continue
        mapped.push({
          role: 'assistant',
          content: text || null,
          ...(toolCalls.length > 0 ? {tool_calls: toolCalls} : {})
        })
        continue
      }

      if (message.role === 'user') {
        // Tool results have to follow the assistant message that requested them.
        let sawToolResult = false
        for (const item of message.content) {
          if (item.type !== 'tool_result') continue
          sawToolResult = true
          mapped.push({role: 'tool', tool_call_id: item.toolUseId, content: item.content})
        }

        const text = textOf(message.content)
        if (text || !sawToolResult) mapped.push({role: 'user', content: text})
        continue
      }

      const text = textOf(message.content)
      mapped.push(message.role === 'developer' ? {role: 'developer', content: text} : {role: 'system', content: text})
    }

    return mapped
  }

  async query(messages: readonly Message[], systemMessage?: string): Promise<ModelResponse> {
    const client = this.getClient()
    const request: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: this.mapMessages(messages, systemMessage),
      max_completion_tokens: this.options.maxOutputTokens,
      ...(this.tools.length > 0 ? {tools: toChatCompletionTools(this.tools), tool_choice: 'auto' as const} : {})
    }

    const completion = await client.chat.completions.create(request).catch((error: unknown) => {
      throw toInferenceError(this.name, error, this.errorBodies.take())
    })
    return fromChatCompletion(this.name, completion)
  }
}
