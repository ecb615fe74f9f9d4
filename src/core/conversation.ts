import {randomUUID} from 'node:crypto'
import type {LLMProvider} from '../providers/types.js'
import type {TreeSource} from '../tools/git-tree.js'
import {InvalidRoleError, errorMessage} from './errors.js'
import type {EventBus} from './event-bus.js'
import type {AgentEvent} from './events.js'
import {contentToString, roleLabel, type Message} from './messages.js'
import {buildSystemPrompt} from './system-prompt.js'
import {bpeTokenizer, countTokens, type Tokenizer} from './tokenizer.js'

export type ConversationSessionOptions = {
  provider: LLMProvider
  tree: TreeSource
  /** Token budget for the history sent to the provider. */
  maxTokens: number
  tokenizer?: Tokenizer
  bus?: EventBus<AgentEvent>
  id?: string
}

/**
 * Message history plus one request/response turn per `send`. The history
 * only ever reflects complete, successful turns.
 */
export class ConversationSession {
  readonly id: string
  readonly provider: LLMProvider
  readonly maxTokens: number
  private history: Message[] = []
  private readonly tree: TreeSource
  private readonly tokenizer: Tokenizer
  private readonly bus?: EventBus<AgentEvent>

  constructor(options: ConversationSessionOptions) {
    this.id = options.id ?? randomUUID()
    this.provider = options.provider
    this.tree = options.tree
    this.maxTokens = Math.max(0, options.maxTokens)
    this.tokenizer = options.tokenizer ?? bpeTokenizer
    this.bus = options.bus
  }

  get messages(): readonly Message[] {
    return [...this.history]
  }

  messageTokens(message: Message): number {
    return countTokens(this.tokenizer, `${roleLabel(message.role)} ${contentToString(message.content)}`)
  }

  estimateTokens(): number {
    return this.history.reduce((total, message) => total + this.messageTokens(message), 0)
  }

  /** Drops the oldest messages until the history fits the budget; returns how many went. */
  trimToBudget(): number {
    let dropped = 0
    let total = this.estimateTokens()
    while (total > this.maxTokens && this.history.length > 0) {
      const [oldest] = this.history.splice(0, 1)
      total -= this.messageTokens(oldest)
      dropped += 1
    }

    if (dropped > 0) {
      this.bus?.publish({
        type: 'context_trim',
        sessionId: this.id,
        dropped,
        remainingTokens: total,
        maxTokens: this.maxTokens
      })
    }

    return dropped
  }

  clear(): void {
    this.history = []
  }

  async send(message: Message): Promise<Message> {
    if (message.role !== 'user') throw new InvalidRoleError(message.role)

    const systemPrompt = buildSystemPrompt(await this.tree.getTree())
    const snapshot = [...this.history]

    try {
      this.trimToBudget()
      this.history.push(message)
      const response = await this.provider.query([...this.history], systemPrompt)
      const reply: Message = {role: 'assistant', content: response.content}
      this.history.push(reply)
      this.bus?.publish({type: 'message', sessionId: this.id, role: message.role, content: message.content})
      this.bus?.publish({type: 'message', sessionId: this.id, role: reply.role, content: reply.content})
      return reply
    } catch (error) {
      this.history = snapshot
      this.bus?.publish({type: 'turn_rollback', sessionId: this.id, error: errorMessage(error)})
      throw error
    }
  }
}
