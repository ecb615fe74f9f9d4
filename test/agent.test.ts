import {mkdtemp, readFile, rm} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {afterEach, beforeEach, describe, expect, it} from 'vitest'
import {appConfigSchema, type AppConfig} from '../src/config/schema.js'
import {
  MAX_STEPS_NOTICE,
  TOOL_NOT_RUN_NOTICE,
  closeAgentRuntime,
  createAgentRuntime,
  runAgentTurn
} from '../src/core/agent.js'
import {ApiError, NetworkError} from '../src/core/errors.js'
import {InMemoryEventBus} from '../src/core/event-bus.js'
import type {AgentEvent} from '../src/core/events.js'
import type {ModelResponse} from '../src/core/messages.js'
import {ScriptedProvider, staticTree, textResponse, wordTokenizer} from './helpers.js'

function toolCall(id: string, name: string, input: Record<string, string | number>): ModelResponse {
  return {
    content: [{type: 'tool_use', id, name, input}],
    id: `resp-${id}`,
    model: 'stub',
    role: 'assistant',
    stopReason: 'tool_use',
    stopSequence: null
  }
}

describe('agent turn loop', () => {
  let root = ''
  let config: AppConfig
  let events: AgentEvent[]
  let bus: InMemoryEventBus<AgentEvent>

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'codeloom-agent-'))
    config = appConfigSchema.parse({provider: 'mock', workspace: root, homeDir: join(root, '.home')})
    events = []
    bus = new InMemoryEventBus<AgentEvent>()
    bus.subscribe((event) => events.push(event))
  })

  afterEach(async () => {
    await rm(root, {recursive: true, force: true})
  })

  async function runtimeWith(provider: ScriptedProvider) {
    return createAgentRuntime(config, {bus, provider, root, tree: staticTree(), tokenizer: wordTokenizer})
  }

  it('runs tools until the model answers with text', async () => {
    const provider = new ScriptedProvider([
      toolCall('c1', 'write_file', {path: 'notes.txt', content: 'hello'}),
      toolCall('c2', 'read_file', {path: 'notes.txt'}),
      textResponse('all done')
    ])
    const runtime = await runtimeWith(provider)

    await expect(runAgentTurn(runtime, 'write notes')).resolves.toBe('all done')
    await expect(readFile(join(root, 'notes.txt'), 'utf8')).resolves.toBe('hello')

    expect(provider.calls).toHaveLength(3)
    expect(provider.calls[2].messages.at(-1)).toEqual({
      role: 'user',
      content: [{type: 'tool_result', toolUseId: 'c2', content: 'hello'}]
    })
    expect(runtime.session.messages).toHaveLength(6)
    expect(events.map((event) => event.type)).toEqual([
      'start',
      'model_request_start',
      'message',
      'message',
      'tool_call',
      'tool_result',
      'model_request_start',
      'message',
      'message',
      'tool_call',
      'tool_result',
      'model_request_start',
      'message',
      'message',
      'final'
    ])
  })

  it('answers malformed tool input with an error result instead of failing the turn', async () => {
    const provider = new ScriptedProvider([toolCall('c1', 'execute', {statement: 7}), textResponse('sorry')])
    const runtime = await runtimeWith(provider)

    await expect(runAgentTurn(runtime, 'run it')).resolves.toBe('sorry')
    expect(provider.calls[1].messages.at(-1)).toEqual({
      role: 'user',
      content: [
        {
          type: 'tool_result',
          toolUseId: 'c1',
          content: "Invalid input for tool 'execute': field 'statement' must be a string, got number"
        }
      ]
    })
    expect(events.find((event) => event.type === 'tool_input_error')).toEqual({
      type: 'tool_input_error',
      sessionId: runtime.session.id,
      step: 0,
      id: 'c1',
      tool: 'execute',
      field: 'statement',
      reason: 'must be a string, got number'
    })
  })

  it('stops after the step limit while the model keeps calling tools', async () => {
    const provider = new ScriptedProvider([
      toolCall('c1', 'execute', {statement: 'true'}),
      toolCall('c2', 'execute', {statement: 'true'}),
      toolCall('c3', 'execute', {statement: 'true'})
    ])
    const runtime = await runtimeWith(provider)

    await expect(runAgentTurn(runtime, 'loop', {maxSteps: 2})).resolves.toBe(MAX_STEPS_NOTICE)
    expect(provider.calls).toHaveLength(3)
    expect(events.at(-1)).toEqual({type: 'max_steps', sessionId: runtime.session.id, step: 2})
  })

  it('answers tool uses from a turn whose follow-up send failed', async () => {
    const provider = new ScriptedProvider([
      toolCall('c1', 'execute', {statement: 'echo hi'}),
      new NetworkError('scripted', 'connection reset'),
      textResponse('resumed')
    ])
    const runtime = await runtimeWith(provider)

    await expect(runAgentTurn(runtime, 'go')).rejects.toBeInstanceOf(NetworkError)
    expect(runtime.session.messages).toHaveLength(2)

    await expect(runAgentTurn(runtime, 'next')).resolves.toBe('resumed')
    expect(provider.calls[2].messages.at(-1)).toEqual({
      role: 'user',
      content: [
        {type: 'tool_result', toolUseId: 'c1', content: 'exit_code=0\nStdout:\nhi\nStderr:\n'},
        {type: 'text', text: 'next'}
      ]
    })
    expect(runtime.unsentResults).toEqual([])
  })

  it('answers tool uses left pending by the step limit', async () => {
    const provider = new ScriptedProvider([
      toolCall('c1', 'execute', {statement: 'true'}),
      toolCall('c2', 'execute', {statement: 'true'}),
      textResponse('ok')
    ])
    const runtime = await runtimeWith(provider)

    await expect(runAgentTurn(runtime, 'loop', {maxSteps: 1})).resolves.toBe(MAX_STEPS_NOTICE)
    await expect(runAgentTurn(runtime, 'continue')).resolves.toBe('ok')
    expect(provider.calls[2].messages.at(-1)).toEqual({
      role: 'user',
      content: [
        {type: 'tool_result', toolUseId: 'c2', content: TOOL_NOT_RUN_NOTICE},
        {type: 'text', text: 'continue'}
      ]
    })
  })

  it('propagates inference errors with the history rolled back', async () => {
    const provider = new ScriptedProvider([textResponse('first'), new ApiError('scripted', 503, 'overloaded')])
    const runtime = await runtimeWith(provider)

    await runAgentTurn(runtime, 'one')
    await expect(runAgentTurn(runtime, 'two')).rejects.toThrow('scripted: API error 503: overloaded')
    expect(runtime.session.messages).toHaveLength(2)
  })

  it('announces the session log path and ends the session', async () => {
    const runtime = await runtimeWith(new ScriptedProvider([]))
    closeAgentRuntime(runtime)

    expect(events[0]).toEqual({
      type: 'start',
      sessionId: runtime.session.id,
      provider: 'scripted',
      model: 'stub',
      workspace: root,
      logPath: join(root, '.home', 'sessions', `${runtime.session.id}.jsonl`)
    })
    expect(events.at(-1)).toEqual({type: 'session_end', sessionId: runtime.session.id})
  })

  it('wires the mock provider from config', async () => {
    const runtime = await createAgentRuntime(config, {root, tree: staticTree()})
    await expect(runAgentTurn(runtime, 'ping')).resolves.toBe('Mock response: ping')
  })
})
