import {mkdtemp, readFile, rm, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest'
import {SessionLogSubscriber} from '../src/core/subscribers/session-log-subscriber.js'

describe('SessionLogSubscriber', () => {
  let dir = ''

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'codeloom-log-'))
  })

  afterEach(async () => {
    await rm(dir, {recursive: true, force: true})
  })

  it('appends one JSON line per event to the announced log path', async () => {
    const logPath = join(dir, 'sessions', 's1.jsonl')
    const subscriber = new SessionLogSubscriber()

    await subscriber.handle({type: 'start', sessionId: 's1', provider: 'mock', model: 'mock', workspace: dir, logPath})
    await subscriber.handle({type: 'tool_result', sessionId: 's1', step: 0, id: 'c1', tool: 'execute', output: 'ok'})
    await subscriber.handle({type: 'session_end', sessionId: 's1'})
    await subscriber.flush()

    const lines = (await readFile(logPath, 'utf8')).trim().split('\n')
    const records: unknown[] = lines.map((line) => JSON.parse(line))
    expect(records).toHaveLength(3)
    expect(records[0]).toMatchObject({type: 'start', provider: 'mock', workspace: dir, logPath})
    expect(records[1]).toMatchObject({type: 'tool_result', step: 0, id: 'c1', tool: 'execute', output: 'ok'})
    expect(records[2]).toEqual({ts: expect.any(String), type: 'session_end'})
  })

  it('ignores sessions that never announced a log path', async () => {
    const subscriber = new SessionLogSubscriber()
    await subscriber.handle({type: 'start', sessionId: 's2', provider: 'mock', model: 'mock', workspace: dir})
    await subscriber.handle({type: 'final', sessionId: 's2', step: 0, content: 'done'})
    await subscriber.flush()
  })

  it('reports write failures without rejecting', async () => {
    const blocker = join(dir, 'blocker')
    await writeFile(blocker, 'not a directory', 'utf8')
    const logPath = join(blocker, 's3.jsonl')
    const onWriteFailure = vi.fn()
    const subscriber = new SessionLogSubscriber(onWriteFailure)

    await subscriber.handle({type: 'start', sessionId: 's3', provider: 'mock', model: 'mock', workspace: dir, logPath})

    expect(onWriteFailure).toHaveBeenCalledOnce()
    expect(onWriteFailure.mock.calls[0][1]).toBe(logPath)
  })
})
