// --- Backends ---

/** Stable label a connector is registered under, e.g. `'relational'` or `'warehouse'`. */
export type BackendId = string

export type BackendEngine = 'postgres' | 'clickhouse' | 'trino' | 'memory'

export type Row = Record<string, unknown>

// --- Outcomes ---

export interface QuerySuccess {
  readonly kind: 'success'
  readonly query: string
  readonly rows: readonly Row[]
  readonly backend: BackendId
  readonly explanation: string
  readonly durationMs: number
}

export interface QueryFailure {
  readonly kind: 'failure'
  readonly errorMessage: string
  readonly backend: BackendId
  /** Absent when the failing query was not known at failure time. */
  readonly query?: string | undefined
  /** Driver or mesh error code (SQLSTATE, ClickHouse code, `ECONNRESET`, `QUERY_CANCELLED`, ...). */
  readonly errorCode?: string | undefined
  /** The connector's own classification: worth retrying or not. */
  readonly transient: boolean
}

export type QueryOutcome = QuerySuccess | QueryFailure

export function isSuccess(outcome: QueryOutcome): outcome is QuerySuccess {
  return outcome.kind === 'success'
}

export function isFailure(outcome: QueryOutcome): outcome is QueryFailure {
  return outcome.kind === 'failure'
}
