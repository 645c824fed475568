import type { BackendEngine, BackendId, QueryOutcome } from './outcome.js'
import type { TraceEvent } from './trace.js'

export interface AggregateResult {
  readonly outcomes: Readonly<Record<BackendId, QueryOutcome>>
  /** Wall-clock time from dispatch to the last branch completing. */
  readonly totalDurationMs: number
  readonly requestId: string
  readonly correlationId: string
  readonly debugLog?: readonly TraceEvent[] | undefined
}

export interface BackendHealth {
  readonly engine: BackendEngine
  readonly healthy: boolean
  readonly latencyMs: number
  readonly error?: string | undefined
}

export interface HealthCheckResult {
  readonly healthy: boolean
  readonly backends: Readonly<Record<BackendId, BackendHealth>>
}
