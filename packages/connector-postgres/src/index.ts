import type { ConnectionOptions } from 'node:tls'
import type { BackendConnector, BackendId, EventSink, Row } from '@querymesh/core'
import {
  beginCorrelation,
  ConnectionError,
  defineConnector,
  errorCodeOf,
  errorMessageOf,
  ExecutionError,
  isTransientError,
} from '@querymesh/core'
import type { PoolClient } from 'pg'
import pg from 'pg'

// Parse NUMERIC/DECIMAL and INT8 as JavaScript numbers instead of strings
pg.types.setTypeParser(1700, parseFloat) // numeric / decimal
pg.types.setTypeParser(20, Number) // int8 / bigint

export interface PostgresConnectorConfig {
  /** Defaults to `relational`. */
  readonly backend?: BackendId | undefined
  readonly connectionString?: string | undefined
  readonly host?: string | undefined
  readonly port?: number | undefined
  readonly database?: string | undefined
  readonly user?: string | undefined
  readonly password?: string | undefined
  readonly ssl?: boolean | ConnectionOptions | undefined
  readonly max?: number | undefined
  /** Server-side `statement_timeout`. */
  readonly timeoutMs?: number | undefined
  /** Receives errors raised by idle pooled clients. */
  readonly sink?: EventSink | undefined
}

// SQLSTATEs worth a retry: admin shutdown, crash recovery, serialization
// failure, deadlock, too many connections, statement cancelled
const TRANSIENT_SQLSTATES = new Set(['57P01', '57P02', '57P03', '40001', '40P01', '53300', '57014'])

const QUERY_CANCELED = '57014'

/** Class 08 (connection exception), the codes above, then the generic network rules. */
export function isPostgresTransient(err: unknown): boolean {
  const code = errorCodeOf(err)
  if (code !== undefined && (code.startsWith('08') || TRANSIENT_SQLSTATES.has(code))) return true
  return isTransientError(err)
}

/** Host reported in connection errors; the password never leaves the connection string. */
export function describeTarget(config: PostgresConnectorConfig): string | undefined {
  if (config.host !== undefined) return config.port !== undefined ? `${config.host}:${config.port}` : config.host
  if (config.connectionString === undefined) return undefined
  try {
    const url = new URL(config.connectionString)
    return url.port !== '' ? `${url.hostname}:${url.port}` : url.hostname
  } catch {
    return 'connectionString'
  }
}

export function createPostgresConnector(config: PostgresConnectorConfig): BackendConnector {
  const backend = config.backend ?? 'relational'
  const pool = new pg.Pool({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl,
    max: config.max,
    statement_timeout: config.timeoutMs,
  })

  // An idle client losing its socket is emitted here; pg discards that client
  // and the next checkout opens a new one.
  pool.on('error', (err) => {
    beginCorrelation({ sink: config.sink })
      .child(backend)
      .warn('idle postgres client error', { errorCode: errorCodeOf(err), error: errorMessageOf(err) })
  })

  return defineConnector({
    backend,
    engine: 'postgres',
    isTransient: isPostgresTransient,
    driver: {
      async run(query: string, signal: AbortSignal): Promise<Row[]> {
        const failed = (cause: Error): ExecutionError =>
          new ExecutionError({ code: 'QUERY_FAILED', backend, engine: 'postgres', query, cause }, cause)

        let client: PoolClient
        try {
          client = await pool.connect()
        } catch (err) {
          throw failed(err instanceof Error ? err : new Error(String(err)))
        }
        let released = false
        // Dropping the connection is the only way to stop a running statement from here
        const release = (destroy: boolean): void => {
          if (released) return
          released = true
          client.release(destroy)
        }
        const onAbort = (): void => release(true)
        signal.addEventListener('abort', onAbort, { once: true })

        try {
          const result = await client.query<Row>(query)
          return result.rows
        } catch (err) {
          const cause = err instanceof Error ? err : new Error(String(err))
          if (config.timeoutMs !== undefined && errorCodeOf(cause) === QUERY_CANCELED && !signal.aborted) {
            throw new ExecutionError(
              { code: 'QUERY_TIMEOUT', backend, engine: 'postgres', query, timeoutMs: config.timeoutMs },
              cause,
            )
          }
          throw failed(cause)
        } finally {
          signal.removeEventListener('abort', onAbort)
          release(signal.aborted)
        }
      },

      async ping(): Promise<void> {
        try {
          await pool.query('SELECT 1')
        } catch (err) {
          throw new ConnectionError(
            'CONNECTION_FAILED',
            'PostgreSQL ping failed',
            { url: describeTarget(config) },
            err instanceof Error ? err : undefined,
          )
        }
      },

      async close(): Promise<void> {
        await pool.end()
      },
    },
  })
}

export type { BackendConnector } from '@querymesh/core'
