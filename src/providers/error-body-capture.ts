import type {HttpTransport} from './types.js'

/**
 * Wraps a transport so the raw text of the latest non-2xx response can be
 * read back after the SDK has turned it into an error. One query is in
 * flight per provider at a time.
 */
export class ErrorBodyCapture {
  private lastBody?: string

  wrap(transport: HttpTransport = fetch): HttpTransport {
    return async (input, init) => {
      const response = await transport(input, init)
      if (!response.ok) this.lastBody = await response.clone().text()
      return response
    }
  }

  /** Returns and forgets the captured body. */
  take(): string | undefined {
    const body = this.lastBody
    this.lastBody = undefined
    return body
  }
}
