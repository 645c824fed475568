import type {
  AggregateResult,
  BackendHealth,
  BackendId,
  HealthCheckResult,
  QueryFailure,
  QueryOutcome,
  SelectionMask,
  UnreachableBackend,
} from '@querymesh/validation'
import {
  CallerError,
  ConnectionError,
  isValidTimeout,
  MAX_TIMEOUT_MS,
  resolveSelection,
  validateMeshConfig,
} from '@querymesh/validation'

import { cancelledFailure } from './connector/defineConnector.js'
import type { RetryPolicy, RetryPolicyConfig } from './retry/policy.js'
import { toRetryPolicy } from './retry/policy.js'
import type { CorrelationHandle } from './trace/correlation.js'
import { beginCorrelation } from './trace/correlation.js'
import type { EventSink } from './trace/sinks.js'
import { noopSink } from './trace/sinks.js'
import { withSpan } from './trace/span.js'
import type { BackendConnector } from './types/interfaces.js'
import { AbortedWhileWaiting, linkAbort, raceAbort, TimeoutReason } from './util/abort.js'

// ── Public Types ───────────────────────────────────────────────

export interface CreateQueryMeshOptions {
  readonly connectors: readonly BackendConnector[]
  readonly retry?: RetryPolicy | RetryPolicyConfig | undefined
  readonly sink?: EventSink | undefined
  /** Default deadline for a whole fan-out; overridable per call. */
  readonly timeoutMs?: number | undefined
  /** Ping every connector at creation and fail fast when any is unreachable. */
  readonly validateConnections?: boolean | undefined
  readonly idGenerator?: (() => string) | undefined
}

export interface ExecuteCallOptions {
  readonly signal?: AbortSignal | undefined
  readonly timeoutMs?: number | undefined
  readonly correlationId?: string | undefined
  /** Attach the request's trace events to the result as `debugLog`. */
  readonly debug?: boolean | undefined
}

export interface QueryMesh {
  readonly backends: readonly BackendId[]
  execute(query: string, selection?: SelectionMask, options?: ExecuteCallOptions): Promise<AggregateResult>
  healthCheck(): Promise<HealthCheckResult>
  close(): Promise<void>
}

// ── createQueryMesh ────────────────────────────────────────────

export async function createQueryMesh(options: CreateQueryMeshOptions): Promise<QueryMesh> {
  const connectors = new Map<BackendId, BackendConnector>()
  const backends = options.connectors.map((c) => c.backend)

  const maxAttempts = options.retry !== undefined && !('wrap' in options.retry) ? options.retry.maxAttempts : undefined
  const configErr = validateMeshConfig({ backends, maxAttempts, timeoutMs: options.timeoutMs })
  if (configErr !== null) throw configErr

  for (const connector of options.connectors) connectors.set(connector.backend, connector)

  const retry = toRetryPolicy(options.retry)
  const sink = options.sink ?? noopSink

  if (options.validateConnections === true) {
    await pingAllOrThrow(options.connectors)
  }

  let closed = false

  return {
    backends,

    async execute(query, selection = { mode: 'all' }, callOptions = {}) {
      if (closed) throw new CallerError('MESH_CLOSED')
      if (query.trim().length === 0) throw new CallerError('EMPTY_QUERY')
      if (callOptions.timeoutMs !== undefined && !isValidTimeout(callOptions.timeoutMs)) {
        throw new CallerError(
          'INVALID_TIMEOUT',
          `timeoutMs must be a positive number <= ${MAX_TIMEOUT_MS}, got ${callOptions.timeoutMs}`,
        )
      }
      const selected = resolveSelection(selection, backends)

      const trace = beginCorrelation({
        sink,
        correlationId: callOptions.correlationId,
        idGenerator: options.idGenerator,
        collect: callOptions.debug === true,
      })
      return fanOut(query, selected, connectors, retry, trace, callOptions.timeoutMs ?? options.timeoutMs, callOptions)
    },

    async healthCheck() {
      return measureHealth(options.connectors)
    },

    async close() {
      closed = true
      await closeAll(options.connectors)
    },
  }
}

// ── Fan-out / Fan-in ───────────────────────────────────────────

async function fanOut(
  query: string,
  selected: readonly BackendId[],
  connectors: ReadonlyMap<BackendId, BackendConnector>,
  retry: RetryPolicy,
  trace: CorrelationHandle,
  timeoutMs: number | undefined,
  callOptions: ExecuteCallOptions,
): Promise<AggregateResult> {
  const request = new AbortController()
  const unlink = callOptions.signal !== undefined ? linkAbort(callOptions.signal, request) : () => {}
  const timer =
    timeoutMs !== undefined ? setTimeout(() => request.abort(new TimeoutReason(timeoutMs)), timeoutMs) : undefined

  trace.info('fan-out started', { backends: [...selected], timeoutMs, maxAttempts: retry.maxAttempts })
  const start = Date.now()

  try {
    // 1. Dispatch: one independent task per backend
    const tasks = selected.map((backend) => {
      const connector = connectors.get(backend)
      if (connector === undefined) {
        return Promise.resolve(crashedFailure(backend, query, new Error(`No connector registered for ${backend}`)))
      }
      return runBranch(connector, query, retry, trace.child(backend), request.signal)
    })

    // 2. Join: every branch settles regardless of its siblings
    const settled = await Promise.allSettled(tasks)
    const totalDurationMs = Date.now() - start

    // 3. Assemble, keyed by identity
    const outcomes: Record<BackendId, QueryOutcome> = {}
    settled.forEach((result, i) => {
      const backend = selected[i]
      if (backend === undefined) return
      outcomes[backend] = result.status === 'fulfilled' ? result.value : crashedFailure(backend, query, result.reason)
    })

    const statuses = Object.fromEntries(Object.entries(outcomes).map(([b, o]) => [b, o.kind]))
    trace.info('fan-out completed', { totalDurationMs, statuses })

    const ids = trace.current()
    const debugLog = trace.end()
    return freezeResult({
      outcomes,
      totalDurationMs,
      requestId: ids.requestId,
      correlationId: ids.correlationId,
      ...(callOptions.debug === true ? { debugLog } : {}),
    })
  } finally {
    if (timer !== undefined) clearTimeout(timer)
    unlink()
  }
}

async function runBranch(
  connector: BackendConnector,
  query: string,
  retry: RetryPolicy,
  trace: CorrelationHandle,
  requestSignal: AbortSignal,
): Promise<QueryOutcome> {
  // Own controller per branch so each can be cancelled individually
  const branch = new AbortController()
  const unlink = linkAbort(requestSignal, branch)

  try {
    return await withSpan(
      trace,
      'backend query',
      (span) => raceAbort(retry.wrap(connector, query, { signal: branch.signal, trace: span }), branch.signal),
      { engine: connector.engine },
    )
  } catch (err) {
    if (err instanceof AbortedWhileWaiting) {
      const failure = cancelledFailure(connector.backend, query, branch.signal)
      trace.warn('backend query cancelled', { errorCode: failure.errorCode, error: failure.errorMessage })
      return failure
    }
    // Connector broke its no-throw contract; record it against this backend only
    return crashedFailure(connector.backend, query, err)
  } finally {
    unlink()
  }
}

function crashedFailure(backend: BackendId, query: string, err: unknown): QueryFailure {
  const message = err instanceof Error ? err.message : String(err)
  return {
    kind: 'failure',
    errorMessage: `Backend task crashed: ${message}`,
    backend,
    query,
    errorCode: 'TASK_CRASHED',
    transient: false,
  }
}

// Row values stay untouched: they may be Buffers or objects the connector still owns
function freezeResult(result: AggregateResult): AggregateResult {
  for (const outcome of Object.values(result.outcomes)) {
    if (outcome.kind === 'success') Object.freeze(outcome.rows)
    Object.freeze(outcome)
  }
  Object.freeze(result.outcomes)
  if (result.debugLog !== undefined) Object.freeze(result.debugLog)
  return Object.freeze(result)
}

// ── Ping / Health / Close ──────────────────────────────────────

async function pingAllOrThrow(connectors: readonly BackendConnector[]): Promise<void> {
  const results = await Promise.allSettled(connectors.map((c) => c.ping()))
  const unreachable: UnreachableBackend[] = []

  results.forEach((result, i) => {
    const connector = connectors[i]
    if (result.status === 'rejected' && connector !== undefined) {
      unreachable.push({
        backend: connector.backend,
        engine: connector.engine,
        cause: result.reason instanceof Error ? result.reason : undefined,
      })
    }
  })

  if (unreachable.length > 0) {
    throw new ConnectionError('CONNECTION_FAILED', `Unreachable: ${unreachable.map((u) => u.backend).join(', ')}`, {
      unreachable,
    })
  }
}

async function measureHealth(connectors: readonly BackendConnector[]): Promise<HealthCheckResult> {
  const entries = await Promise.all(
    connectors.map(async (connector): Promise<[BackendId, BackendHealth]> => {
      const s = Date.now()
      try {
        await connector.ping()
        return [connector.backend, { engine: connector.engine, healthy: true, latencyMs: Date.now() - s }]
      } catch (err) {
        return [
          connector.backend,
          {
            engine: connector.engine,
            healthy: false,
            latencyMs: Date.now() - s,
            error: err instanceof Error ? err.message : String(err),
          },
        ]
      }
    }),
  )

  return {
    healthy: entries.every(([, h]) => h.healthy),
    backends: Object.fromEntries(entries),
  }
}

async function closeAll(connectors: readonly BackendConnector[]): Promise<void> {
  const failures: UnreachableBackend[] = []

  for (const connector of connectors) {
    try {
      await connector.close()
    } catch (err) {
      failures.push({
        backend: connector.backend,
        engine: connector.engine,
        cause: err instanceof Error ? err : new Error(String(err)),
      })
    }
  }

  if (failures.length > 0) {
    throw new ConnectionError('CONNECTION_FAILED', `Failed to close: ${failures.map((f) => f.backend).join(', ')}`, {
      unreachable: failures,
    })
  }
}
