export type EventHandler<TEvent> = (event: TEvent) => void

export type HandlerErrorListener<TEvent> = (error: unknown, event: TEvent) => void

export interface EventBus<TEvent> {
  publish(event: TEvent): void
  subscribe(handler: EventHandler<TEvent>): () => void
}

/**
 * Synchronous fan-out. A throwing subscriber is reported to `onHandlerError`
 * and never interrupts the publisher or the remaining subscribers.
 */
export class InMemoryEventBus<TEvent> implements EventBus<TEvent> {
  private readonly handlers = new Set<EventHandler<TEvent>>()
  private readonly onHandlerError?: HandlerErrorListener<TEvent>

  constructor(onHandlerError?: HandlerErrorListener<TEvent>) {
    this.onHandlerError = onHandlerError
  }

  publish(event: TEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event)
      } catch (error) {
        this.onHandlerError?.(error, event)
      }
    }
  }

  subscribe(handler: EventHandler<TEvent>): () => void {
    this.handlers.add(handler)
    return () => {
      this.handlers.delete(handler)
    }
  }
}
