import {describe, expect, it, vi} from 'vitest'
import {InMemoryEventBus} from '../src/core/event-bus.js'

describe('InMemoryEventBus', () => {
  it('delivers events to every subscriber in order', () => {
    const bus = new InMemoryEventBus<string>()
    const seen: string[] = []
    bus.subscribe((event) => seen.push(`a:${event}`))
    bus.subscribe((event) => seen.push(`b:${event}`))

    bus.publish('one')

    expect(seen).toEqual(['a:one', 'b:one'])
  })

  it('reports a throwing subscriber and keeps delivering', () => {
    const onHandlerError = vi.fn()
    const bus = new InMemoryEventBus<string>(onHandlerError)
    const failure = new Error('subscriber broke')
    const after = vi.fn()
    bus.subscribe(() => {
      throw failure
    })
    bus.subscribe(after)

    bus.publish('event')

    expect(onHandlerError).toHaveBeenCalledWith(failure, 'event')
    expect(after).toHaveBeenCalledWith('event')
  })

  it('stops delivering after unsubscribe', () => {
    const bus = new InMemoryEventBus<number>()
    const handler = vi.fn()
    const unsubscribe = bus.subscribe(handler)

    unsubscribe()
    bus.publish(1)

    expect(handler).not.toHaveBeenCalled()
  })
})
