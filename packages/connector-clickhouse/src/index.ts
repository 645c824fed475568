import { createClient } from '@clickhouse/client'
import type { BackendConnector, BackendId, Row } from '@querymesh/core'
import { ConnectionError, defineConnector, errorCodeOf, ExecutionError, isTransientError } from '@querymesh/core'

export interface ClickHouseConnectorConfig {
  /** Defaults to `warehouse`. */
  readonly backend?: BackendId | undefined
  readonly url?: string | undefined
  readonly username?: string | undefined
  readonly password?: string | undefined
  readonly database?: string | undefined
  /** Sent as `max_execution_time`, rounded up to whole seconds. */
  readonly timeoutMs?: number | undefined
}

const TIMEOUT_EXCEEDED = '159'

// TIMEOUT_EXCEEDED, TOO_SLOW, TOO_MANY_SIMULTANEOUS_QUERIES, SOCKET_TIMEOUT,
// NETWORK_ERROR, SYSTEM_ERROR
const TRANSIENT_CODES = new Set([TIMEOUT_EXCEEDED, '160', '202', '209', '210', '425'])

export function isClickHouseTransient(err: unknown): boolean {
  const code = errorCodeOf(err)
  if (code !== undefined && TRANSIENT_CODES.has(code)) return true
  return isTransientError(err)
}

export function createClickHouseConnector(config: ClickHouseConnectorConfig): BackendConnector {
  const backend = config.backend ?? 'warehouse'
  const settings: Record<string, number | string | boolean> = {}
  if (config.timeoutMs !== undefined) {
    settings.max_execution_time = Math.ceil(config.timeoutMs / 1000)
  }

  const client = createClient({
    url: config.url,
    username: config.username,
    password: config.password,
    database: config.database,
    clickhouse_settings: settings,
  })

  return defineConnector({
    backend,
    engine: 'clickhouse',
    isTransient: isClickHouseTransient,
    driver: {
      async run(query: string, signal: AbortSignal): Promise<Row[]> {
        try {
          const result = await client.query({ query, format: 'JSONEachRow', abort_signal: signal })
          return await result.json<Row>()
        } catch (err) {
          const cause = err instanceof Error ? err : new Error(String(err))
          if (config.timeoutMs !== undefined && errorCodeOf(cause) === TIMEOUT_EXCEEDED) {
            throw new ExecutionError(
              { code: 'QUERY_TIMEOUT', backend, engine: 'clickhouse', query, timeoutMs: config.timeoutMs },
              cause,
            )
          }
          throw new ExecutionError({ code: 'QUERY_FAILED', backend, engine: 'clickhouse', query, cause }, cause)
        }
      },

      async ping(): Promise<void> {
        const result = await client.ping().catch((err: unknown) => {
          throw new ConnectionError(
            'CONNECTION_FAILED',
            'ClickHouse ping failed',
            { url: config.url },
            err instanceof Error ? err : undefined,
          )
        })
        if (!result.success) {
          throw new ConnectionError('CONNECTION_FAILED', 'ClickHouse ping failed', { url: config.url }, result.error)
        }
      },

      async close(): Promise<void> {
        await client.close()
      },
    },
  })
}

export type { BackendConnector } from '@querymesh/core'
