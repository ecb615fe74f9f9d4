import type {ContentItem, JsonValue, Role} from './messages.js'

export type AgentEvent =
  | {type: 'start'; sessionId: string; provider: string; model: string; workspace: string; logPath?: string}
  | {type: 'message'; sessionId: string; role: Role; content: readonly ContentItem[]}
  | {type: 'context_trim'; sessionId: string; dropped: number; remainingTokens: number; maxTokens: number}
  | {type: 'turn_rollback'; sessionId: string; error: string}
  | {type: 'model_request_start'; sessionId: string; step: number}
  | {type: 'tool_call'; sessionId: string; step: number; id: string; tool: string; input: JsonValue}
  | {type: 'tool_result'; sessionId: string; step: number; id: string; tool: string; output: string}
  | {type: 'tool_input_error'; sessionId: string; step: number; id: string; tool: string; field: string; reason: string}
  | {type: 'final'; sessionId: string; step: number; content: string}
  | {type: 'max_steps'; sessionId: string; step: number}
  | {type: 'session_end'; sessionId: string}
