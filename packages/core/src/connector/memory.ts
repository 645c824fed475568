import type { BackendId, Row } from '@querymesh/validation'
import { ConnectionError, ExecutionError } from '@querymesh/validation'
import type { BackendConnector } from '../types/interfaces.js'
import { sleep } from '../util/abort.js'
import { defineConnector } from './defineConnector.js'

export interface MemoryConnectorOptions {
  readonly backend: BackendId
  /** Fixed rows, or a handler computing rows (or throwing) per query. */
  readonly rows?: readonly Row[] | ((query: string) => Row[] | Promise<Row[]>) | undefined
  readonly delayMs?: number | undefined
  readonly isTransient?: ((err: unknown) => boolean) | undefined
}

/**
 * In-process connector for tests, demos and the contract suite. Queries
 * containing `__fail__` are rejected as malformed.
 */
export function createMemoryConnector(options: MemoryConnectorOptions): BackendConnector {
  let closed = false

  return defineConnector({
    backend: options.backend,
    engine: 'memory',
    isTransient: options.isTransient,
    driver: {
      async run(query, signal) {
        if (options.delayMs !== undefined && options.delayMs > 0) await sleep(options.delayMs, signal)
        try {
          if (closed) throw new Error('connector is closed')
          if (query.includes('__fail__')) throw new Error(`syntax error at or near "__fail__"`)
          const source = options.rows ?? []
          const rows = typeof source === 'function' ? await source(query) : source
          return rows.map((row) => ({ ...row }))
        } catch (err) {
          const cause = err instanceof Error ? err : new Error(String(err))
          throw new ExecutionError(
            { code: 'QUERY_FAILED', backend: options.backend, engine: 'memory', query, cause },
            cause,
          )
        }
      },

      async ping() {
        if (closed) {
          throw new ConnectionError('CONNECTION_FAILED', `Memory connector ${options.backend} is closed`, {})
        }
      },

      async close() {
        closed = true
      },
    },
  })
}
