import type { AggregateResult, BackendId, HealthCheckResult, SelectionMask } from '@querymesh/validation'
import { CallerError, ConnectionError, QueryMeshError, resolveSelection } from '@querymesh/validation'

import { deserializeError } from './errors.js'

// ── Types ──────────────────────────────────────────────────────

export interface QueryMeshClientConfig {
  readonly baseUrl: string
  readonly headers?: Record<string, string> | undefined
  readonly fetch?: typeof globalThis.fetch | undefined
  readonly timeout?: number | undefined
  /** The server's registered backends; when set, selections are checked before sending. */
  readonly backends?: readonly BackendId[] | undefined
}

export interface ClientExecuteOptions {
  readonly correlationId?: string | undefined
  readonly debug?: boolean | undefined
}

export interface QueryMeshClient {
  execute(query: string, selection?: SelectionMask, options?: ClientExecuteOptions): Promise<AggregateResult>
  healthCheck(): Promise<HealthCheckResult>
}

type FetchInit = NonNullable<Parameters<typeof globalThis.fetch>[1]>

// ── Factory ────────────────────────────────────────────────────

export function createQueryMeshClient(config: QueryMeshClientConfig): QueryMeshClient {
  const { baseUrl, timeout = 30_000, backends } = config
  const customHeaders = config.headers ?? {}
  const fetchFn = config.fetch ?? globalThis.fetch

  async function request(path: string, init: FetchInit): Promise<unknown> {
    const controller = new AbortController()
    const timer = timeout > 0 ? setTimeout(() => controller.abort(), timeout) : undefined

    try {
      const res = await fetchFn(`${baseUrl}${path}`, { ...init, signal: controller.signal })
      const body: unknown = await res.json()

      if (!res.ok) {
        throw deserializeError(body)
      }

      return body
    } catch (err) {
      if (err instanceof QueryMeshError) throw err
      if (controller.signal.aborted) {
        throw new ConnectionError('REQUEST_TIMEOUT', `Request timed out after ${timeout}ms`, {
          url: `${baseUrl}${path}`,
          timeoutMs: timeout,
        })
      }
      throw new ConnectionError(
        'NETWORK_ERROR',
        err instanceof Error ? err.message : String(err),
        { url: `${baseUrl}${path}` },
        err instanceof Error ? err : undefined,
      )
    } finally {
      if (timer !== undefined) clearTimeout(timer)
    }
  }

  return {
    async execute(query, selection = { mode: 'all' }, options = {}) {
      // Optional local check: fail fast before the network round-trip
      if (backends !== undefined) {
        if (query.trim().length === 0) throw new CallerError('EMPTY_QUERY')
        resolveSelection(selection, backends)
      }

      const headers: Record<string, string> = { 'Content-Type': 'application/json', ...customHeaders }
      if (options.correlationId !== undefined) headers['x-correlation-id'] = options.correlationId

      const body = await request('/query', {
        method: 'POST',
        headers,
        body: JSON.stringify({ query, selection, ...(options.debug === true ? { debug: true } : {}) }),
      })
      return body as AggregateResult
    },

    async healthCheck() {
      const body = await request('/health', { method: 'GET', headers: customHeaders })
      return body as HealthCheckResult
    },
  }
}
