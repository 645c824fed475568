import type { BackendEngine, BackendId, QueryOutcome, Row } from '@querymesh/validation'
import type { CorrelationHandle } from '../trace/correlation.js'

// --- BackendConnector (implemented by connector packages) ---

export interface ExecuteOptions {
  /** Aborted when the mesh call is cancelled or times out. */
  readonly signal?: AbortSignal | undefined
  readonly trace?: CorrelationHandle | undefined
}

/**
 * One backend behind the mesh.
 *
 * Contract:
 * - `execute()` never rejects. Every failure (connection, malformed query,
 *   timeout, abort) resolves to a `QueryFailure` carrying `backend`.
 * - Each call acquires its own scoped resource and releases it on every exit path.
 * - `ping()` throws `ConnectionError` (code: `'CONNECTION_FAILED'`) on any failure.
 * - `close()` should attempt cleanup; failures may propagate as raw errors.
 *
 * Instances are shared across concurrent calls and keep no per-call state.
 */
export interface BackendConnector {
  readonly backend: BackendId
  readonly engine: BackendEngine
  execute(query: string, options?: ExecuteOptions): Promise<QueryOutcome>
  ping(): Promise<void>
  close(): Promise<void>
}

// --- ConnectorDriver (wrapped by defineConnector) ---

/**
 * Driver-level glue for one engine. Unlike `BackendConnector`, `run()` may throw;
 * drivers throw `ExecutionError` with code `'QUERY_FAILED'`.
 */
export interface ConnectorDriver {
  run(query: string, signal: AbortSignal): Promise<Row[]>
  ping(): Promise<void>
  close(): Promise<void>
}
