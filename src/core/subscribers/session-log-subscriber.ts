import {appendFile, mkdir} from 'node:fs/promises'
import {dirname} from 'node:path'
import type {AgentEvent} from '../events.js'

type SessionLogRecord = {
  ts: string
  type: string
  [key: string]: unknown
}

export type LogWriteFailureListener = (error: unknown, logPath: string) => void

/**
 * Appends every event of a session to the JSONL file announced by its
 * `start` event. Writes per session are chained so lines never interleave.
 */
export class SessionLogSubscriber {
  private readonly logPaths = new Map<string, string>()
  private readonly pendingBySession = new Map<string, Promise<void>>()
  private readonly onWriteFailure?: LogWriteFailureListener

  constructor(onWriteFailure?: LogWriteFailureListener) {
    this.onWriteFailure = onWriteFailure
  }

  async handle(event: AgentEvent): Promise<void> {
    const ts = new Date().toISOString()

    if (event.type === 'start') {
      if (!event.logPath) return
      this.logPaths.set(event.sessionId, event.logPath)
    }

    const {type, sessionId, ...fields} = event
    await this.append(sessionId, {ts, type, ...fields})

    if (event.type === 'session_end') {
      this.logPaths.delete(sessionId)
      this.pendingBySession.delete(sessionId)
    }
  }

  private async append(sessionId: string, record: SessionLogRecord): Promise<void> {
    const logPath = this.logPaths.get(sessionId)
    if (!logPath) return
    const previous = this.pendingBySession.get(sessionId) ?? Promise.resolve()
    const next = previous.then(async () => {
      try {
        await mkdir(dirname(logPath), {recursive: true})
        await appendFile(logPath, `${JSON.stringify(record)}\n`, 'utf8')
      } catch (error) {
        // Reported, never rethrown.
        this.onWriteFailure?.(error, logPath)
      }
    })
    this.pendingBySession.set(sessionId, next)
    await next
  }

  async flush(): Promise<void> {
    await Promise.all(this.pendingBySession.values())
  }
}
