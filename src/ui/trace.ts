import type {EventBus} from '../core/event-bus.js'
import type {AgentEvent} from '../core/events.js'
import {SessionLogSubscriber} from '../core/subscribers/session-log-subscriber.js'
import {errorMessage} from '../core/errors.js'
import {formatEventLine, red} from './event-line.js'

export type TraceOptions = {
  quiet?: boolean
  debug?: boolean
}

export type Trace = {
  /** Waits for pending log writes, then detaches every subscriber. */
  close(): Promise<void>
}

/** Hooks the session log and the terminal trace onto a bus. */
export function attachTrace(bus: EventBus<AgentEvent>, log: (line: string) => void, options: TraceOptions = {}): Trace {
  const startedAt = Date.now()
  let lastEventAt = startedAt
  const sessionLog = new SessionLogSubscriber((error, logPath) => {
    log(red(`session log write failed (${logPath}): ${errorMessage(error)}`))
  })

  const unsubscribeLog = bus.subscribe((event) => {
    void sessionLog.handle(event)
  })

  const unsubscribeTerminal = options.quiet
    ? () => {}
    : bus.subscribe((event) => {
        const line = formatEventLine(event)
        if (line === undefined) return
        if (!options.debug) {
          log(line)
          return
        }

        const nowAt = Date.now()
        const deltaMs = nowAt - lastEventAt
        lastEventAt = nowAt
        log(`[debug +${deltaMs}ms total=${nowAt - startedAt}ms] ${line}`)
      })

  return {
    async close() {
      await sessionLog.flush()
      unsubscribeTerminal()
      unsubscribeLog()
    }
  }
}
