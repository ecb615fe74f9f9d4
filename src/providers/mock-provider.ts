import type {Message, ModelResponse} from '../core/messages.js'
import {textOf} from '../core/messages.js'
import type {LLMProvider} from './types.js'

/** Offline backend: echoes the last user text, never calls tools. */
export class MockProvider implements LLMProvider {
  readonly name = 'mock'
  readonly model = 'mock'
  private counter = 0

  async query(messages: readonly Message[], _systemMessage?: string): Promise<ModelResponse> {
    this.counter += 1
    const last = messages.at(-1)
    const text = last ? `Mock response: ${textOf(last.content, ' ')}` : 'No input provided.'
    return {
      content: [{type: 'text', text}],
      id: `mock-${this.counter}`,
      model: this.model,
      role: 'assistant',
      stopReason: 'end_turn',
      stopSequence: null
    }
  }
}
