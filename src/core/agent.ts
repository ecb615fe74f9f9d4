import type {AppConfig} from '../config/schema.js'
import {getSessionLogPath} from '../config/paths.js'
import {providerFromConfig} from '../providers/select-provider.js'
import type {HttpTransport, LLMProvider} from '../providers/types.js'
import {ToolDispatcher} from '../tools/dispatcher.js'
import {GitTree, resolveProjectRoot, type TreeSource} from '../tools/git-tree.js'
import {ConversationSession} from './conversation.js'
import {ToolInputError} from './errors.js'
import type {EventBus} from './event-bus.js'
import type {AgentEvent} from './events.js'
import {
  textOf,
  toolResultMessage,
  toolUsesOf,
  userMessage,
  type Message,
  type ToolResultContent,
  type ToolUseContent
} from './messages.js'
import type {Tokenizer} from './tokenizer.js'

export type AgentRuntime = {
  session: ConversationSession
  dispatcher: ToolDispatcher
  root: string
  maxSteps: number
  bus?: EventBus<AgentEvent>
  /** Results computed in a turn whose follow-up send failed. */
  unsentResults: ToolResultContent[]
}

export type AgentRuntimeOptions = {
  bus?: EventBus<AgentEvent>
  /** Overrides the provider selected from config. */
  provider?: LLMProvider
  fetch?: HttpTransport
  tree?: TreeSource
  tokenizer?: Tokenizer
  /** Skip git discovery and use this directory as the project root. */
  root?: string
}

export type AgentRunOptions = {
  maxSteps?: number
}

export const MAX_STEPS_NOTICE = 'Stopped after maximum tool steps. Please refine the task and retry.'

export const TOOL_NOT_RUN_NOTICE = 'Tool call was not run: the previous turn ended before it.'

export async function createAgentRuntime(config: AppConfig, options: AgentRuntimeOptions = {}): Promise<AgentRuntime> {
  const provider = options.provider ?? providerFromConfig(config, options.fetch)
  const root = options.root ?? (await resolveProjectRoot(config.workspace))
  const session = new ConversationSession({
    provider,
    tree: options.tree ?? new GitTree(root),
    maxTokens: config.maxContext,
    tokenizer: options.tokenizer,
    bus: options.bus
  })
  const dispatcher = new ToolDispatcher({root, compileCheckTimeoutMs: config.runtime.compileCheckTimeoutMs})

  options.bus?.publish({
    type: 'start',
    sessionId: session.id,
    provider: provider.name,
    model: provider.model,
    workspace: root,
    logPath: getSessionLogPath(session.id, config.homeDir)
  })

  return {session, dispatcher, root, maxSteps: config.runtime.maxSteps, bus: options.bus, unsentResults: []}
}

async function runToolUse(runtime: AgentRuntime, toolUse: ToolUseContent, step: number): Promise<ToolResultContent> {
  const {session, dispatcher, bus} = runtime
  bus?.publish({type: 'tool_call', sessionId: session.id, step, id: toolUse.id, tool: toolUse.name, input: toolUse.input})

  try {
    const output = await dispatcher.dispatch(toolUse)
    bus?.publish({type: 'tool_result', sessionId: session.id, step, id: toolUse.id, tool: toolUse.name, output})
    return {type: 'tool_result', toolUseId: toolUse.id, content: output}
  } catch (error) {
    if (!(error instanceof ToolInputError)) throw error
    // Answer the malformed call so the tool_use never goes unanswered in history.
    bus?.publish({
      type: 'tool_input_error',
      sessionId: session.id,
      step,
      id: toolUse.id,
      tool: toolUse.name,
      field: error.field,
      reason: error.reason
    })
    return {type: 'tool_result', toolUseId: toolUse.id, content: error.message}
  }
}

/**
 * Opening message of a turn. Tool uses left unanswered by the previous turn
 * (step limit, or a failed follow-up send) are answered first.
 */
function openingMessage(runtime: AgentRuntime, text: string): Message {
  const last = runtime.session.messages.at(-1)
  const pending = last?.role === 'assistant' ? toolUsesOf(last.content) : []
  if (pending.length === 0) return userMessage(text)

  const results = pending.map(
    (toolUse): ToolResultContent =>
      runtime.unsentResults.find((result) => result.toolUseId === toolUse.id) ?? {
        type: 'tool_result',
        toolUseId: toolUse.id,
        content: TOOL_NOT_RUN_NOTICE
      }
  )
  return {role: 'user', content: [...results, {type: 'text', text}]}
}

/**
 * One user turn: send the text, then keep dispatching tool uses and sending
 * their results until the model answers without tools or steps run out.
 * Inference errors propagate with the session history already rolled back.
 */
export async function runAgentTurn(runtime: AgentRuntime, text: string, options: AgentRunOptions = {}): Promise<string> {
  const {session, bus} = runtime
  const maxSteps = options.maxSteps ?? runtime.maxSteps

  bus?.publish({type: 'model_request_start', sessionId: session.id, step: 0})
  let reply = await session.send(openingMessage(runtime, text))
  runtime.unsentResults = []

  for (let step = 0; step < maxSteps; step += 1) {
    const toolUses = toolUsesOf(reply.content)
    if (toolUses.length === 0) {
      const content = textOf(reply.content)
      bus?.publish({type: 'final', sessionId: session.id, step, content})
      return content
    }

    const results: ToolResultContent[] = []
    for (const toolUse of toolUses) {
      results.push(await runToolUse(runtime, toolUse, step))
    }

    bus?.publish({type: 'model_request_start', sessionId: session.id, step: step + 1})
    try {
      reply = await session.send(toolResultMessage(results))
    } catch (error) {
      runtime.unsentResults = results
      throw error
    }
  }

  const pending = toolUsesOf(reply.content)
  if (pending.length === 0) {
    const content = textOf(reply.content)
    bus?.publish({type: 'final', sessionId: session.id, step: maxSteps, content})
    return content
  }

  bus?.publish({type: 'max_steps', sessionId: session.id, step: maxSteps})
  return MAX_STEPS_NOTICE
}

export function closeAgentRuntime(runtime: AgentRuntime): void {
  runtime.bus?.publish({type: 'session_end', sessionId: runtime.session.id})
}
