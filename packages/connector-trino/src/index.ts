import type { BackendConnector, BackendId, EventSink, Row } from '@querymesh/core'
import {
  beginCorrelation,
  cancellationOf,
  ConnectionError,
  defineConnector,
  errorMessageOf,
  ExecutionError,
  isTransientError,
  linkAbort,
  rootCause,
  TimeoutReason,
} from '@querymesh/core'
import { BasicAuth, Trino } from 'trino-client'

export interface TrinoConnectorConfig {
  /** Defaults to `federated`. */
  readonly backend?: BackendId | undefined
  readonly server: string
  readonly catalog?: string | undefined
  readonly schema?: string | undefined
  readonly user?: string | undefined
  readonly source?: string | undefined
  /** Client-side deadline; the running query is cancelled on the coordinator. */
  readonly timeoutMs?: number | undefined
  /** Receives coordinator-side cancel failures. */
  readonly sink?: EventSink | undefined
}

/** An error page returned by the coordinator. `code` is Trino's error name. */
export class TrinoQueryError extends Error {
  readonly code: string
  readonly errorType: string

  constructor(error: { message: string; errorName: string; errorType: string }) {
    super(error.message)
    this.name = 'TrinoQueryError'
    this.code = error.errorName
    this.errorType = error.errorType
  }
}

const TRANSIENT_ERROR_TYPES = new Set(['INSUFFICIENT_RESOURCES', 'EXTERNAL'])
const TRANSIENT_ERROR_NAMES = new Set(['EXCEEDED_TIME_LIMIT', 'SERVER_STARTING_UP', 'TOO_MANY_REQUESTS_FAILED'])

export function isTrinoTransient(err: unknown): boolean {
  const cause = rootCause(err)
  if (cause instanceof TrinoQueryError) {
    return TRANSIENT_ERROR_TYPES.has(cause.errorType) || TRANSIENT_ERROR_NAMES.has(cause.code)
  }
  return isTransientError(err)
}

function rowToObject(columns: readonly string[], row: readonly unknown[]): Row {
  const obj: Row = {}
  for (let i = 0; i < columns.length; i++) {
    const col = columns[i]
    if (col !== undefined) {
      obj[col] = row[i]
    }
  }
  return obj
}

export function createTrinoConnector(config: TrinoConnectorConfig): BackendConnector {
  const backend = config.backend ?? 'federated'
  const trino = Trino.create({
    server: config.server,
    ...(config.catalog !== undefined ? { catalog: config.catalog } : {}),
    ...(config.schema !== undefined ? { schema: config.schema } : {}),
    ...(config.source !== undefined ? { source: config.source } : {}),
    ...(config.user !== undefined ? { auth: new BasicAuth(config.user) } : {}),
  })

  function stopped(query: string, signal: AbortSignal): ExecutionError {
    const { code, reason } = cancellationOf(signal)
    if (code === 'QUERY_TIMEOUT' && signal.reason instanceof TimeoutReason) {
      return new ExecutionError({
        code: 'QUERY_TIMEOUT',
        backend,
        engine: 'trino',
        query,
        timeoutMs: signal.reason.timeoutMs,
      })
    }
    return new ExecutionError({ code: 'QUERY_CANCELLED', backend, engine: 'trino', query, reason })
  }

  async function submitAndCollect(query: string, signal: AbortSignal): Promise<Row[]> {
    const controller = new AbortController()
    const unlink = linkAbort(signal, controller)
    const timeoutMs = config.timeoutMs
    const timer =
      timeoutMs !== undefined ? setTimeout(() => controller.abort(new TimeoutReason(timeoutMs)), timeoutMs) : undefined

    let queryId: string | undefined
    let cancelling: Promise<void> | undefined
    const cancel = (): void => {
      if (queryId === undefined || cancelling !== undefined) return
      const id = queryId
      // A failed cancel must not replace the timeout or cancellation being reported
      cancelling = trino.cancel(id).then(
        () => undefined,
        (err: unknown) => {
          beginCorrelation({ sink: config.sink })
            .child(backend)
            .warn('trino cancel failed', { queryId: id, error: errorMessageOf(err) })
        },
      )
    }
    controller.signal.addEventListener('abort', cancel, { once: true })

    try {
      const iter = await trino.query(query)
      const columns: string[] = []
      const rows: Row[] = []

      // Pages arrive as the coordinator long-polls; abort is noticed between pages
      for await (const result of iter) {
        queryId = result.id

        if (result.error !== undefined) throw new TrinoQueryError(result.error)
        if (controller.signal.aborted) {
          cancel()
          throw stopped(query, controller.signal)
        }

        if (result.columns !== undefined && columns.length === 0) {
          for (const col of result.columns) {
            columns.push(col.name)
          }
        }

        if (result.data !== undefined) {
          for (const row of result.data) {
            rows.push(rowToObject(columns, row))
          }
        }
      }

      return rows
    } finally {
      if (timer !== undefined) clearTimeout(timer)
      controller.signal.removeEventListener('abort', cancel)
      unlink()
      if (cancelling !== undefined) await cancelling
    }
  }

  return defineConnector({
    backend,
    engine: 'trino',
    isTransient: isTrinoTransient,
    driver: {
      async run(query: string, signal: AbortSignal): Promise<Row[]> {
        try {
          return await submitAndCollect(query, signal)
        } catch (err) {
          if (err instanceof ExecutionError) throw err
          const cause = err instanceof Error ? err : new Error(String(err))
          throw new ExecutionError({ code: 'QUERY_FAILED', backend, engine: 'trino', query, cause }, cause)
        }
      },

      async ping(): Promise<void> {
        try {
          await submitAndCollect('SELECT 1', new AbortController().signal)
        } catch (err) {
          throw new ConnectionError(
            'CONNECTION_FAILED',
            'Trino ping failed',
            { url: config.server },
            err instanceof Error ? err : undefined,
          )
        }
      },

      async close(): Promise<void> {
        // trino-client is HTTP-based; no persistent connection to close
      },
    },
  })
}

export type { BackendConnector } from '@querymesh/core'
