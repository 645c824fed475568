import { afterEach, describe, expect, it, vi } from 'vitest'
import type { BackendConnector, QueryFailure, Row } from '../src/index.js'
import {
  CallerError,
  ConfigError,
  ConnectionError,
  createMemoryConnector,
  createMemorySink,
  createQueryMesh,
} from '../src/index.js'

// ── Mock helpers ───────────────────────────────────────────────

const threeRows: Row[] = [
  { id: 1, region: 'emea' },
  { id: 2, region: 'apac' },
  { id: 3, region: 'amer' },
]

function countingConnector(backend: string, rows: Row[] = threeRows): { connector: BackendConnector; calls: () => number } {
  let calls = 0
  const connector = createMemoryConnector({
    backend,
    rows: () => {
      calls++
      return rows
    },
  })
  return { connector, calls: () => calls }
}

function unreachable(backend: string): { connector: BackendConnector; calls: () => number } {
  let calls = 0
  const connector = createMemoryConnector({
    backend,
    rows: () => {
      calls++
      throw Object.assign(new Error('connect ECONNREFUSED 10.0.0.7:8123'), { code: 'ECONNREFUSED' })
    },
  })
  return { connector, calls: () => calls }
}

function crashingConnector(backend: string): BackendConnector {
  return {
    backend,
    engine: 'memory',
    execute: async () => {
      throw new Error('driver exploded')
    },
    ping: async () => {},
    close: async () => {},
  }
}

const noWait = { sleep: async () => {} }

function counterIds(): () => string {
  let n = 0
  return () => `id-${++n}`
}

// ── Tests ──────────────────────────────────────────────────────

describe('Pipeline — createQueryMesh init', () => {
  it('rejects zero connectors', async () => {
    await expect(createQueryMesh({ connectors: [] })).rejects.toThrow(ConfigError)
  })

  it('rejects a mesh timeout beyond the timer limit', async () => {
    const err = await createQueryMesh({
      connectors: [countingConnector('relational').connector],
      timeoutMs: 3_000_000_000,
    }).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ConfigError)
    expect((err as ConfigError).errors.map((e) => e.code)).toEqual(['INVALID_TIMEOUT'])
  })

  it('rejects duplicate backend ids', async () => {
    try {
      await createQueryMesh({
        connectors: [createMemoryConnector({ backend: 'relational' }), createMemoryConnector({ backend: 'relational' })],
      })
      expect.fail('Expected ConfigError')
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError)
      expect((err as ConfigError).errors.map((e) => e.code)).toEqual(['DUPLICATE_BACKEND'])
    }
  })

  it('rejects an invalid retry budget', async () => {
    await expect(
      createQueryMesh({ connectors: [createMemoryConnector({ backend: 'relational' })], retry: { maxAttempts: 0 } }),
    ).rejects.toThrow('Config invalid: 1 error')
  })

  it('validateConnections — unreachable connector fails creation', async () => {
    const bad: BackendConnector = {
      ...createMemoryConnector({ backend: 'warehouse' }),
      backend: 'warehouse',
      ping: async () => {
        throw new Error('ECONNREFUSED')
      },
    }

    try {
      await createQueryMesh({
        connectors: [createMemoryConnector({ backend: 'relational' }), bad],
        validateConnections: true,
      })
      expect.fail('Expected ConnectionError')
    } catch (err) {
      expect(err).toBeInstanceOf(ConnectionError)
      expect((err as ConnectionError).message).toBe('Unreachable: warehouse')
    }
  })

  it('exposes registered backends in order', async () => {
    const mesh = await createQueryMesh({
      connectors: [createMemoryConnector({ backend: 'relational' }), createMemoryConnector({ backend: 'warehouse' })],
    })
    expect(mesh.backends).toEqual(['relational', 'warehouse'])
  })
})

describe('Pipeline — selection', () => {
  it('one outcome per selected backend, none for unselected', async () => {
    const mesh = await createQueryMesh({
      connectors: [
        countingConnector('relational').connector,
        countingConnector('warehouse').connector,
        countingConnector('federated').connector,
      ],
    })

    const result = await mesh.execute('SELECT 1', { mode: 'exclude', backends: ['warehouse'] })
    expect(Object.keys(result.outcomes)).toEqual(['relational', 'federated'])
  })

  it('default selection is every backend', async () => {
    const mesh = await createQueryMesh({
      connectors: [countingConnector('relational').connector, countingConnector('warehouse').connector],
    })

    const result = await mesh.execute('SELECT 1')
    expect(Object.keys(result.outcomes)).toEqual(['relational', 'warehouse'])
  })

  it('empty selection is rejected before any connector is invoked', async () => {
    const relational = countingConnector('relational')
    const warehouse = countingConnector('warehouse')
    const mesh = await createQueryMesh({ connectors: [relational.connector, warehouse.connector] })

    try {
      await mesh.execute('SELECT 1', { mode: 'include', backends: [] })
      expect.fail('Expected CallerError')
    } catch (err) {
      expect(err).toBeInstanceOf(CallerError)
      expect((err as CallerError).code).toBe('EMPTY_SELECTION')
    }
    expect(relational.calls()).toBe(0)
    expect(warehouse.calls()).toBe(0)
  })

  it('unknown backend is rejected before dispatch', async () => {
    const relational = countingConnector('relational')
    const mesh = await createQueryMesh({ connectors: [relational.connector] })

    await expect(mesh.execute('SELECT 1', { mode: 'include', backends: ['lake'] })).rejects.toThrow(
      'Unknown backends: lake',
    )
    expect(relational.calls()).toBe(0)
  })

  it('blank query is a caller error', async () => {
    const relational = countingConnector('relational')
    const mesh = await createQueryMesh({ connectors: [relational.connector] })

    await expect(mesh.execute('   ')).rejects.toMatchObject({ code: 'EMPTY_QUERY' })
    expect(relational.calls()).toBe(0)
  })

  it.each([-1, 0, Number.NaN, 3_000_000_000])('per-call timeout %s is a caller error', async (timeoutMs) => {
    const relational = countingConnector('relational')
    const mesh = await createQueryMesh({ connectors: [relational.connector] })

    const err = await mesh.execute('SELECT 1', undefined, { timeoutMs }).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(CallerError)
    expect(err).toMatchObject({
      code: 'INVALID_TIMEOUT',
      message: `timeoutMs must be a positive number <= 2147483647, got ${timeoutMs}`,
    })
    expect(relational.calls()).toBe(0)
  })
})

describe('Pipeline — fan-out / fan-in', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('relational only: one success with 3 rows, warehouse absent', async () => {
    const mesh = await createQueryMesh({
      connectors: [countingConnector('relational').connector, countingConnector('warehouse').connector],
    })

    const result = await mesh.execute('SELECT * FROM regions', { mode: 'include', backends: ['relational'] })

    expect(Object.keys(result.outcomes)).toEqual(['relational'])
    expect('warehouse' in result.outcomes).toBe(false)
    const outcome = result.outcomes.relational
    expect(outcome?.kind).toBe('success')
    if (outcome?.kind === 'success') {
      expect(outcome.rows).toHaveLength(3)
      expect(outcome.query).toBe('SELECT * FROM regions')
      expect(outcome.explanation).toBe('Successfully executed query returning 3 rows')
    }
  })

  it('all backends succeed → only success variants', async () => {
    const mesh = await createQueryMesh({
      connectors: [countingConnector('relational').connector, countingConnector('warehouse').connector],
    })

    const result = await mesh.execute('SELECT 1')
    expect(Object.values(result.outcomes).map((o) => o.kind)).toEqual(['success', 'success'])
  })

  it('warehouse keeps failing transiently past the budget → one success, one failure', async () => {
    const relational = countingConnector('relational')
    const warehouse = unreachable('warehouse')
    const mesh = await createQueryMesh({
      connectors: [relational.connector, warehouse.connector],
      retry: { maxAttempts: 3, ...noWait },
    })

    const result = await mesh.execute('SELECT count(*) FROM events')

    expect(Object.keys(result.outcomes)).toHaveLength(2)
    expect(result.outcomes.relational?.kind).toBe('success')
    expect(result.outcomes.warehouse).toEqual({
      kind: 'failure',
      errorMessage: 'Query failed on memory backend: warehouse: connect ECONNREFUSED 10.0.0.7:8123',
      backend: 'warehouse',
      query: 'SELECT count(*) FROM events',
      errorCode: 'ECONNREFUSED',
      transient: true,
    })
    expect(warehouse.calls()).toBe(3)
    expect(relational.calls()).toBe(1)
  })

  it('permanent failure is isolated and not retried', async () => {
    const relational = countingConnector('relational')
    let warehouseCalls = 0
    const warehouse = createMemoryConnector({
      backend: 'warehouse',
      rows: () => {
        warehouseCalls++
        throw new Error('permission denied for table events')
      },
    })
    const mesh = await createQueryMesh({
      connectors: [relational.connector, warehouse],
      retry: { maxAttempts: 5, ...noWait },
    })

    const result = await mesh.execute('SELECT * FROM events')

    expect(result.outcomes.relational?.kind).toBe('success')
    const failure = result.outcomes.warehouse as QueryFailure
    expect(failure.kind).toBe('failure')
    expect(failure.transient).toBe(false)
    expect(failure.errorMessage).toBe('Query failed on memory backend: warehouse: permission denied for table events')
    expect(warehouseCalls).toBe(1)
  })

  it('total time is bounded by the slowest backend, not the sum', async () => {
    vi.useFakeTimers()
    const mesh = await createQueryMesh({
      connectors: [
        createMemoryConnector({ backend: 'relational', rows: threeRows, delayMs: 100 }),
        createMemoryConnector({ backend: 'warehouse', rows: threeRows, delayMs: 150 }),
        createMemoryConnector({
          backend: 'federated',
          delayMs: 120,
          rows: () => {
            throw new Error('permission denied for table secrets')
          },
        }),
      ],
      retry: { maxAttempts: 3, ...noWait },
    })

    const pending = mesh.execute('SELECT 1')
    await vi.advanceTimersByTimeAsync(150)
    const result = await pending

    expect(result.totalDurationMs).toBe(150)
    expect(result.outcomes.relational).toMatchObject({ kind: 'success', durationMs: 100 })
    expect(result.outcomes.warehouse).toMatchObject({ kind: 'success', durationMs: 150 })
    expect(result.outcomes.federated).toMatchObject({ kind: 'failure', transient: false })
  })

  it('a connector that throws is recorded as a failure; siblings complete', async () => {
    const mesh = await createQueryMesh({
      connectors: [countingConnector('relational').connector, crashingConnector('warehouse')],
    })

    const result = await mesh.execute('SELECT 1')
    expect(result.outcomes.relational?.kind).toBe('success')
    expect(result.outcomes.warehouse).toEqual({
      kind: 'failure',
      errorMessage: 'Backend task crashed: driver exploded',
      backend: 'warehouse',
      query: 'SELECT 1',
      errorCode: 'TASK_CRASHED',
      transient: false,
    })
  })

  it('result is immutable', async () => {
    const mesh = await createQueryMesh({ connectors: [countingConnector('relational').connector] })
    const result = await mesh.execute('SELECT 1')

    expect(Object.isFrozen(result)).toBe(true)
    expect(Object.isFrozen(result.outcomes)).toBe(true)
    expect(Object.isFrozen(result.outcomes.relational)).toBe(true)
  })

  it('binary and date column values pass through unfrozen', async () => {
    const blob = Buffer.from('ab')
    const seenAt = new Date(0)
    const mesh = await createQueryMesh({
      connectors: [
        createMemoryConnector({ backend: 'relational', rows: [{ id: 1, blob, seenAt }] }),
        countingConnector('warehouse').connector,
      ],
    })

    const result = await mesh.execute('SELECT 1')
    const outcome = result.outcomes.relational
    if (outcome?.kind !== 'success') throw new Error('expected relational to succeed')

    expect(outcome.rows).toEqual([{ id: 1, blob: Buffer.from('ab'), seenAt: new Date(0) }])
    expect(outcome.rows[0]?.blob).toBe(blob)
    expect(Object.isFrozen(outcome.rows)).toBe(true)
    expect(Object.isFrozen(outcome.rows[0])).toBe(false)
    expect(Object.isFrozen(blob)).toBe(false)
    expect(result.outcomes.warehouse?.kind).toBe('success')
  })
})

describe('Pipeline — cancellation', () => {
  afterEach(() => {
    vi.useRealTimers()
  })

  it('timeout cancels slow branches individually and records them', async () => {
    vi.useFakeTimers()
    const mesh = await createQueryMesh({
      connectors: [
        createMemoryConnector({ backend: 'relational', rows: threeRows, delayMs: 10 }),
        createMemoryConnector({ backend: 'warehouse', rows: threeRows, delayMs: 1000 }),
      ],
      timeoutMs: 100,
    })

    const pending = mesh.execute('SELECT 1')
    await vi.advanceTimersByTimeAsync(100)
    const result = await pending

    expect(result.totalDurationMs).toBe(100)
    expect(result.outcomes.relational?.kind).toBe('success')
    expect(result.outcomes.warehouse).toEqual({
      kind: 'failure',
      errorMessage: 'Query cancelled: timed out after 100ms',
      backend: 'warehouse',
      query: 'SELECT 1',
      errorCode: 'QUERY_TIMEOUT',
      transient: false,
    })
  })

  it('per-call timeout overrides the mesh default', async () => {
    vi.useFakeTimers()
    const mesh = await createQueryMesh({
      connectors: [createMemoryConnector({ backend: 'relational', rows: threeRows, delayMs: 200 })],
      timeoutMs: 1000,
    })

    const pending = mesh.execute('SELECT 1', undefined, { timeoutMs: 50 })
    await vi.advanceTimersByTimeAsync(50)
    const result = await pending

    expect(result.outcomes.relational).toMatchObject({ errorCode: 'QUERY_TIMEOUT' })
  })

  it('caller abort keeps one entry per selected backend', async () => {
    const mesh = await createQueryMesh({
      connectors: [
        createMemoryConnector({ backend: 'relational', rows: threeRows, delayMs: 5000 }),
        createMemoryConnector({ backend: 'warehouse', rows: threeRows, delayMs: 5000 }),
      ],
    })
    const controller = new AbortController()

    const pending = mesh.execute('SELECT 1', { mode: 'all' }, { signal: controller.signal })
    controller.abort('client disconnected')
    const result = await pending

    expect(Object.keys(result.outcomes)).toEqual(['relational', 'warehouse'])
    for (const outcome of Object.values(result.outcomes)) {
      expect(outcome).toMatchObject({
        kind: 'failure',
        errorMessage: 'Query cancelled: client disconnected',
        errorCode: 'QUERY_CANCELLED',
      })
    }
  })

  it('already-aborted signal cancels every branch', async () => {
    const mesh = await createQueryMesh({ connectors: [countingConnector('relational').connector] })
    const controller = new AbortController()
    controller.abort(new Error('shutting down'))

    const result = await mesh.execute('SELECT 1', undefined, { signal: controller.signal })
    expect(result.outcomes.relational).toMatchObject({ errorMessage: 'Query cancelled: shutting down' })
  })
})

describe('Pipeline — correlation', () => {
  it('request and correlation ids are returned and shared by every event', async () => {
    const sink = createMemorySink()
    const mesh = await createQueryMesh({
      connectors: [countingConnector('relational').connector, countingConnector('warehouse').connector],
      sink,
      idGenerator: counterIds(),
    })

    const result = await mesh.execute('SELECT 1', undefined, { correlationId: 'corr-1' })

    expect(result.requestId).toBe('id-1')
    expect(result.correlationId).toBe('corr-1')
    expect(sink.events.length).toBeGreaterThan(0)
    for (const event of sink.events) {
      expect(event.requestId).toBe('id-1')
      expect(event.correlationId).toBe('corr-1')
    }
  })

  it('each backend branch gets its own span under the request span', async () => {
    const sink = createMemorySink()
    const mesh = await createQueryMesh({
      connectors: [countingConnector('relational').connector, countingConnector('warehouse').connector],
      sink,
      idGenerator: counterIds(),
    })

    await mesh.execute('SELECT 1')

    const started = sink.events.filter((e) => e.message === 'backend query started')
    expect(started.map((e) => [e.backend, e.spanId, e.parentSpanId])).toEqual([
      ['relational', 'id-4', 'id-3'],
      ['warehouse', 'id-5', 'id-3'],
    ])
  })

  it('debug: true attaches the request log', async () => {
    const mesh = await createQueryMesh({ connectors: [countingConnector('relational').connector] })

    const result = await mesh.execute('SELECT 1', undefined, { debug: true })
    const messages = result.debugLog?.map((e) => e.message) ?? []
    expect(messages[0]).toBe('fan-out started')
    expect(messages.at(-1)).toBe('fan-out completed')
    expect(messages).toContain('connector query succeeded')
  })

  it('debug log is omitted by default', async () => {
    const mesh = await createQueryMesh({ connectors: [countingConnector('relational').connector] })
    const result = await mesh.execute('SELECT 1')
    expect(result).not.toHaveProperty('debugLog')
  })
})

describe('Pipeline — health / close', () => {
  it('healthCheck reports every backend', async () => {
    const down: BackendConnector = {
      ...createMemoryConnector({ backend: 'warehouse' }),
      ping: async () => {
        throw new Error('ClickHouse ping failed')
      },
    }
    const mesh = await createQueryMesh({ connectors: [createMemoryConnector({ backend: 'relational' }), down] })

    const health = await mesh.healthCheck()
    expect(health.healthy).toBe(false)
    expect(health.backends.relational).toMatchObject({ engine: 'memory', healthy: true })
    expect(health.backends.warehouse).toMatchObject({ healthy: false, error: 'ClickHouse ping failed' })
  })

  it('close closes connectors and rejects further queries', async () => {
    const relational = createMemoryConnector({ backend: 'relational' })
    const mesh = await createQueryMesh({ connectors: [relational] })

    await mesh.close()
    await expect(relational.ping()).rejects.toThrow(ConnectionError)
    await expect(mesh.execute('SELECT 1')).rejects.toMatchObject({ code: 'MESH_CLOSED' })
  })

  it('close failures are collected into a ConnectionError', async () => {
    const stuck: BackendConnector = {
      ...createMemoryConnector({ backend: 'warehouse' }),
      close: async () => {
        throw new Error('socket busy')
      },
    }
    const mesh = await createQueryMesh({ connectors: [createMemoryConnector({ backend: 'relational' }), stuck] })

    await expect(mesh.close()).rejects.toThrow('Failed to close: warehouse')
  })
})
