import type {Message, ModelResponse} from '../src/core/messages.js'
import type {Tokenizer} from '../src/core/tokenizer.js'
import type {LLMProvider} from '../src/providers/types.js'
import type {TreeSource} from '../src/tools/git-tree.js'

/** One token per whitespace-separated word. */
export const wordTokenizer: Tokenizer = {
  encode(text) {
    return text
      .split(/\s+/)
      .filter(Boolean)
      .map((_, index) => index)
  }
}

export const staticTree = (tree = 'src/main.ts'): TreeSource => ({
  async getTree() {
    return tree
  }
})

export function textResponse(text: string, id = 'resp-1'): ModelResponse {
  return {content: [{type: 'text', text}], id, model: 'stub', role: 'assistant', stopReason: 'end_turn', stopSequence: null}
}

export type ScriptedCall = {messages: Message[]; systemMessage?: string}

/** Replays queued responses (or throws queued errors) in order and records every call. */
export class ScriptedProvider implements LLMProvider {
  readonly name = 'scripted'
  readonly model = 'stub'
  readonly calls: ScriptedCall[] = []
  private readonly script: Array<ModelResponse | Error>

  constructor(script: Array<ModelResponse | Error>) {
    this.script = [...script]
  }

  async query(messages: readonly Message[], systemMessage?: string): Promise<ModelResponse> {
    this.calls.push({messages: [...messages], systemMessage})
    const next = this.script.shift()
    if (next === undefined) throw new Error('script exhausted')
    if (next instanceof Error) throw next
    return next
  }
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {status, headers: {'Content-Type': 'application/json'}})
}

export function requestBody(init?: RequestInit): Record<string, unknown> {
  const parsed: unknown = JSON.parse(String(init?.body))
  if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) throw new Error('expected object body')
  return Object.fromEntries(Object.entries(parsed))
}

export function requestUrl(input: string | URL | Request): string {
  return typeof input === 'string' ? input : input instanceof URL ? input.toString() : input.url
}
