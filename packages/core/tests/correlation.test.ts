import { afterEach, describe, expect, it, vi } from 'vitest'
import type { EventLevel, TraceEvent } from '../src/index.js'
import {
  beginCorrelation,
  combineSinks,
  createConsoleSink,
  createMemorySink,
  formatEvent,
  isEventLevel,
  levelEnabled,
  withSpan,
} from '../src/index.js'

function counterIds(): () => string {
  let n = 0
  return () => `id-${++n}`
}

describe('correlation — beginCorrelation', () => {
  it('mints request, correlation and span ids', () => {
    const trace = beginCorrelation({ idGenerator: counterIds() })
    expect(trace.current()).toEqual({ requestId: 'id-1', correlationId: 'id-2', spanId: 'id-3' })
  })

  it('reuses a caller-supplied correlation id', () => {
    const trace = beginCorrelation({ idGenerator: counterIds(), correlationId: 'order-77' })
    expect(trace.current()).toEqual({ requestId: 'id-1', correlationId: 'order-77', spanId: 'id-2' })
  })

  it('defaults to random UUIDs', () => {
    const ids = beginCorrelation().current()
    expect(ids.requestId).toMatch(/^[0-9a-f-]{36}$/)
    expect(ids.requestId).not.toBe(ids.correlationId)
  })

  it('child keeps request identity and nests its span', () => {
    const trace = beginCorrelation({ idGenerator: counterIds(), correlationId: 'c' })
    const child = trace.child('warehouse')
    expect(child.current()).toEqual({
      requestId: 'id-1',
      correlationId: 'c',
      spanId: 'id-3',
      parentSpanId: 'id-2',
      backend: 'warehouse',
    })
  })

  it('concurrent requests never share identity', async () => {
    const sink = createMemorySink()
    await Promise.all(
      ['a', 'b'].map(async (name) => {
        const trace = beginCorrelation({ sink, correlationId: name })
        await Promise.resolve()
        trace.child(name).info('branch ran')
      }),
    )

    const byCorrelation = sink.events.map((e) => [e.correlationId, e.backend])
    expect(byCorrelation).toEqual([
      ['a', 'a'],
      ['b', 'b'],
    ])
  })

  it('events from children reach the same sink with their ids', () => {
    const sink = createMemorySink()
    const trace = beginCorrelation({ sink, idGenerator: counterIds(), correlationId: 'c' })
    trace.info('parent')
    trace.child('relational').warn('child', { attempt: 2 })

    expect(sink.events).toHaveLength(2)
    expect(sink.events[1]).toMatchObject({
      level: 'warn',
      message: 'child',
      spanId: 'id-3',
      parentSpanId: 'id-2',
      backend: 'relational',
      fields: { attempt: 2 },
    })
  })

  it('end() returns collected events and stops collecting', () => {
    const sink = createMemorySink()
    const trace = beginCorrelation({ sink, collect: true })
    trace.info('one')
    trace.child('x').debug('two')

    const log = trace.end()
    trace.info('after end')

    expect(log.map((e) => e.message)).toEqual(['one', 'two'])
    expect(Object.isFrozen(log)).toBe(true)
    expect(sink.events.map((e) => e.message)).toEqual(['one', 'two', 'after end'])
  })

  it('end() without collect is empty', () => {
    const trace = beginCorrelation()
    trace.info('ignored')
    expect(trace.end()).toEqual([])
  })
})

describe('correlation — withSpan', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('wraps a successful call in started/finished', async () => {
    vi.useFakeTimers()
    const sink = createMemorySink()
    const trace = beginCorrelation({ sink })

    const pending = withSpan(trace, 'lookup', async () => {
      await new Promise((r) => setTimeout(r, 40))
      return 7
    })
    await vi.advanceTimersByTimeAsync(40)

    expect(await pending).toBe(7)
    expect(sink.events.map((e) => e.message)).toEqual(['lookup started', 'lookup finished'])
    expect(sink.events[1]?.fields.durationMs).toBe(40)
  })

  it('logs and rethrows a failure', async () => {
    const sink = createMemorySink()
    const trace = beginCorrelation({ sink })

    await expect(
      withSpan(trace, 'lookup', async () => {
        throw new Error('boom')
      }),
    ).rejects.toThrow('boom')

    const failed = sink.events[1]
    expect(failed?.level).toBe('error')
    expect(failed?.message).toBe('lookup failed')
    expect(failed?.fields.error).toEqual({ message: 'boom', name: 'Error' })
  })
})

describe('correlation — sinks', () => {
  const event: TraceEvent = {
    timestamp: Date.UTC(2026, 0, 2, 3, 4, 5),
    level: 'info',
    message: 'fan-out started',
    requestId: 'r1',
    correlationId: 'c1',
    spanId: 's1',
    fields: { backends: ['relational'] },
  }

  it('formatEvent flattens ids and fields', () => {
    expect(formatEvent({ ...event, parentSpanId: 's0', backend: 'relational' }, 'svc')).toEqual({
      time: '2026-01-02T03:04:05.000Z',
      level: 'info',
      msg: 'fan-out started',
      service: 'svc',
      requestId: 'r1',
      correlationId: 'c1',
      spanId: 's1',
      parentSpanId: 's0',
      backend: 'relational',
      backends: ['relational'],
    })
  })

  it('console sink writes one JSON line per event at or above its level', () => {
    const lines: [string, EventLevel][] = []
    const sink = createConsoleSink({ level: 'warn', write: (line, level) => lines.push([line, level]) })

    sink.emit(event)
    sink.emit({ ...event, level: 'error', message: 'boom', fields: {} })

    expect(lines).toHaveLength(1)
    expect(lines[0]?.[1]).toBe('error')
    expect(JSON.parse(lines[0]?.[0] ?? '')).toEqual({
      time: '2026-01-02T03:04:05.000Z',
      level: 'error',
      msg: 'boom',
      service: 'querymesh',
      requestId: 'r1',
      correlationId: 'c1',
      spanId: 's1',
    })
  })

  it('console sink defaults to console.log and console.error', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    const sink = createConsoleSink()

    sink.emit(event)
    sink.emit({ ...event, level: 'debug' })
    sink.emit({ ...event, level: 'error' })

    expect(log).toHaveBeenCalledTimes(1)
    expect(error).toHaveBeenCalledTimes(1)
    log.mockRestore()
    error.mockRestore()
  })

  it('memory sink records and clears', () => {
    const sink = createMemorySink()
    sink.emit(event)
    expect(sink.events).toEqual([event])
    sink.clear()
    expect(sink.events).toEqual([])
  })

  it('combineSinks fans out', () => {
    const a = createMemorySink()
    const b = createMemorySink()
    combineSinks(a, b).emit(event)
    expect(a.events).toHaveLength(1)
    expect(b.events).toHaveLength(1)
  })

  it('level helpers', () => {
    expect(isEventLevel('warn')).toBe(true)
    expect(isEventLevel('verbose')).toBe(false)
    expect(levelEnabled('info', 'debug')).toBe(true)
    expect(levelEnabled('debug', 'info')).toBe(false)
  })
})
