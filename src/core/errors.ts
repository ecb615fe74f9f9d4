export class CodeloomError extends Error {
  constructor(message: string, options?: {cause?: unknown}) {
    super(message, options)
    this.name = 'CodeloomError'
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export type InferenceErrorCode =
  | 'missing_api_key'
  | 'network_error'
  | 'api_error'
  | 'invalid_response'
  | 'serialization_error'

/**
 * Failure of a single provider query. Never retried by the runtime; the
 * conversation session rolls its history back before rethrowing.
 */
export abstract class InferenceError extends CodeloomError {
  abstract readonly code: InferenceErrorCode
  readonly provider: string

  constructor(provider: string, message: string, options?: {cause?: unknown}) {
    super(`${provider}: ${message}`, options)
    this.name = 'InferenceError'
    this.provider = provider
  }
}

export class MissingApiKeyError extends InferenceError {
  readonly code = 'missing_api_key'

  constructor(provider: string) {
    super(provider, 'API key not found. Set it in your config or environment.')
    this.name = 'MissingApiKeyError'
  }
}

export class NetworkError extends InferenceError {
  readonly code = 'network_error'

  constructor(provider: string, message: string, options?: {cause?: unknown}) {
    super(provider, `network error: ${message}`, options)
    this.name = 'NetworkError'
  }
}

export class ApiError extends InferenceError {
  readonly code = 'api_error'
  readonly status: number
  readonly body: string

  constructor(provider: string, status: number, body: string, options?: {cause?: unknown}) {
    super(provider, `API error ${status}: ${body}`, options)
    this.name = 'ApiError'
    this.status = status
    this.body = body
  }
}

export class InvalidResponseError extends InferenceError {
  readonly code = 'invalid_response'

  constructor(provider: string, message: string, options?: {cause?: unknown}) {
    super(provider, `invalid response: ${message}`, options)
    this.name = 'InvalidResponseError'
  }
}

export class SerializationError extends InferenceError {
  readonly code = 'serialization_error'

  constructor(provider: string, message: string, options?: {cause?: unknown}) {
    super(provider, `serialization error: ${message}`, options)
    this.name = 'SerializationError'
  }
}

export class InvalidRoleError extends CodeloomError {
  readonly role: string

  constructor(role: string) {
    super(`Can only send messages with user role when querying model (got '${role}').`)
    this.name = 'InvalidRoleError'
    this.role = role
  }
}

/** Malformed tool invocation emitted by the model. */
export abstract class ToolInputError extends CodeloomError {
  readonly tool: string
  readonly field: string
  readonly reason: string

  constructor(tool: string, field: string, reason: string) {
    super(`Invalid input for tool '${tool}': field '${field}' ${reason}`)
    this.name = 'ToolInputError'
    this.tool = tool
    this.field = field
    this.reason = reason
  }
}

export class MissingFieldError extends ToolInputError {
  constructor(tool: string, field: string) {
    super(tool, field, 'is missing')
    this.name = 'MissingFieldError'
  }
}

export class WrongFieldTypeError extends ToolInputError {
  constructor(tool: string, field: string, actual: string) {
    super(tool, field, `must be a string, got ${actual}`)
    this.name = 'WrongFieldTypeError'
  }
}

export class GitRootNotFoundError extends CodeloomError {
  readonly cwd: string

  constructor(cwd: string, detail?: string) {
    super(`No git repository found at ${cwd}${detail ? `: ${detail}` : ''}`)
    this.name = 'GitRootNotFoundError'
    this.cwd = cwd
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
