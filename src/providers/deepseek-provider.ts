import type OpenAI from 'openai'
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam
} from 'openai/resources/chat/completions'
import type {Message, ModelResponse, Role, ToolSpec} from '../core/messages.js'
import {contentToString} from '../core/messages.js'
import {TOOL_CATALOG} from '../tools/catalog.js'
import {createChatCompletionsClient, fromChatCompletion, toChatCompletionTools, toInferenceError} from './chat-completions.js'
import {ErrorBodyCapture} from './error-body-capture.js'
import type {LLMProvider, ProviderOptions} from './types.js'

function flatMessage(role: Role, content: string): ChatCompletionMessageParam {
  switch (role) {
    case 'user':
      return {role: 'user', content}
    case 'assistant':
      return {role: 'assistant', content}
    case 'developer':
      return {role: 'developer', content}
    case 'system':
      return {role: 'system', content}
  }
}

/**
 * DeepSeek-style backend: one flat string per message. Tool uses and tool
 * results are re-sent as description text since the wire format has no slot
 * for them; tool calls in responses are still parsed natively.
 */
export class DeepSeekProvider implements LLMProvider {
  readonly name = 'deepseek'
  readonly model: string
  private readonly options: ProviderOptions
  private readonly tools: readonly ToolSpec[]
  private readonly errorBodies = new ErrorBodyCapture()
  private client?: OpenAI

  constructor(options: ProviderOptions) {
    this.options = options
    this.model = options.model
    this.tools = options.tools ?? TOOL_CATALOG
  }

  private getClient(): OpenAI {
    this.client ??= createChatCompletionsClient(this.name, this.options, 'https://api.deepseek.com', this.errorBodies)
    return this.client
  }

  async query(messages: readonly Message[], systemMessage?: string): Promise<ModelResponse> {
    const client = this.getClient()
    const flat: ChatCompletionMessageParam[] = messages.map((message) =>
      flatMessage(message.role, contentToString(message.content))
    )
    if (systemMessage) flat.unshift(flatMessage('system', systemMessage))

    const request: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: flat,
      max_tokens: this.options.maxOutputTokens,
      ...(this.tools.length > 0 ? {tools: toChatCompletionTools(this.tools)} : {})
    }

    const completion = await client.chat.completions.create(request).catch((error: unknown) => {
      throw toInferenceError(this.name, error, this.errorBodies.take())
    })
    return fromChatCompletion(this.name, completion)
  }
}
