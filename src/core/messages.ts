export type Role = 'user' | 'assistant' | 'system' | 'developer'

export type JsonValue = string | number | boolean | null | JsonValue[] | {[key: string]: JsonValue}

export type TextContent = {
  type: 'text'
  text: string
}

export type ToolUseContent = {
  type: 'tool_use'
  id: string
  name: string
  input: JsonValue
}

/** `toolUseId` must point at a `tool_use` from an earlier assistant message. */
export type ToolResultContent = {
  type: 'tool_result'
  toolUseId: string
  content: string
}

export type ContentItem = TextContent | ToolUseContent | ToolResultContent

export type Message = {
  readonly role: Role
  readonly content: readonly ContentItem[]
}

export type ModelResponse = {
  content: ContentItem[]
  id: string
  model: string
  role: string
  stopReason: string | null
  stopSequence: string | null
}

export type ToolParameterSchema = {
  type: 'object'
  properties: Record<string, {type: 'string'; description: string}>
  required: string[]
}

export type ToolSpec = {
  name: string
  description: string
  parameterSchema: ToolParameterSchema
}

const ROLE_LABELS: Record<Role, string> = {
  user: 'User',
  assistant: 'Assistant',
  system: 'System',
  developer: 'Developer'
}

export function roleLabel(role: Role): string {
  return ROLE_LABELS[role]
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true
    case 'number':
      return Number.isFinite(value)
    case 'object':
      if (Array.isArray(value)) return value.every((item) => isJsonValue(item))
      return Object.values(value).every((item) => isJsonValue(item))
    default:
      return false
  }
}

export function userMessage(text: string): Message {
  return {role: 'user', content: [{type: 'text', text}]}
}

export function toolResultMessage(results: ToolResultContent[]): Message {
  return {role: 'user', content: results}
}

export function textOf(content: readonly ContentItem[], separator = '\n'): string {
  return content
    .filter((item): item is TextContent => item.type === 'text')
    .map((item) => item.text)
    .join(separator)
}

export function toolUsesOf(content: readonly ContentItem[]): ToolUseContent[] {
  return content.filter((item): item is ToolUseContent => item.type === 'tool_use')
}

/** Flattens content for token estimation and for flat-text backends. */
export function contentToString(content: readonly ContentItem[]): string {
  return content
    .map((item) => {
      switch (item.type) {
        case 'text':
          return item.text
        case 'tool_use':
          return `tool ${item.name} with input: ${JSON.stringify(item.input)}`
        case 'tool_result':
          return `tool result: ${item.content}`
      }
    })
    .join(' ')
}
