import type {AgentEvent} from '../core/events.js'

export const ANSI = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  bold: '\x1b[1m',
  cyan: '\x1b[36m'
}

export function red(text: string): string {
  return `${ANSI.red}${text}${ANSI.reset}`
}

export function cyan(text: string): string {
  return `${ANSI.cyan}${text}${ANSI.reset}`
}

export function shorten(text: string, max = 500): string {
  if (text.length <= max) return text
  return `${text.slice(0, max)}\n...[truncated]`
}

/** Human-readable trace line; `undefined` for events the terminal stays quiet about. */
export function formatEventLine(event: AgentEvent, at = new Date()): string | undefined {
  const ts = at.toISOString()
  switch (event.type) {
    case 'start':
      return `[${ts}] START provider=${event.provider} model=${event.model} workspace=${event.workspace} session=${event.sessionId}`
    case 'context_trim':
      return `[${ts}] CONTEXT_TRIM dropped=${event.dropped} remaining_tokens=${event.remainingTokens} max_tokens=${event.maxTokens}`
    case 'turn_rollback':
      return `[${ts}] TURN_ROLLBACK error=${event.error}`
    case 'model_request_start':
      return `[${ts}] MODEL_REQUEST_START step=${event.step}`
    case 'tool_call':
      return `[${ts}] TOOL_CALL step=${event.step} tool=${event.tool} input=${JSON.stringify(event.input)}`
    case 'tool_result':
      return `[${ts}] TOOL_RESULT step=${event.step} tool=${event.tool}\n${shorten(event.output)}`
    case 'tool_input_error':
      return `[${ts}] TOOL_INPUT_ERROR step=${event.step} tool=${event.tool} field=${event.field} reason=${event.reason}`
    case 'max_steps':
      return `[${ts}] MAX_STEPS step=${event.step}`
    case 'message':
    case 'final':
    case 'session_end':
      return undefined
  }
}
