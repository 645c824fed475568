import type { BackendEngine, BackendId, QueryFailure, QueryOutcome, Row } from '@querymesh/validation'
import { ExecutionError } from '@querymesh/validation'
import type { BackendConnector, ConnectorDriver, ExecuteOptions } from '../types/interfaces.js'
import { AbortedWhileWaiting, cancellationOf, raceAbort } from '../util/abort.js'
import { errorCodeOf, errorMessageOf, isTransientError } from './classify.js'

export interface DefineConnectorOptions {
  readonly backend: BackendId
  readonly engine: BackendEngine
  readonly driver: ConnectorDriver
  /** Classifies a thrown driver error. Defaults to `isTransientError`. */
  readonly isTransient?: ((err: unknown) => boolean) | undefined
}

export function explainRows(count: number): string {
  return `Successfully executed query returning ${count} ${count === 1 ? 'row' : 'rows'}`
}

/**
 * Build a `BackendConnector` from a driver that may throw. Times the call,
 * materializes success, and turns every thrown value into a `QueryFailure`.
 */
export function defineConnector(options: DefineConnectorOptions): BackendConnector {
  const { backend, engine, driver } = options
  const isTransient = options.isTransient ?? isTransientError

  function toFailure(query: string, err: unknown): QueryFailure {
    if (err instanceof ExecutionError && err.details.code === 'QUERY_TIMEOUT') {
      return { kind: 'failure', errorMessage: err.message, backend, query, errorCode: 'QUERY_TIMEOUT', transient: true }
    }
    if (err instanceof ExecutionError && err.details.code === 'QUERY_CANCELLED') {
      return { kind: 'failure', errorMessage: err.message, backend, query, errorCode: 'QUERY_CANCELLED', transient: false }
    }
    return {
      kind: 'failure',
      errorMessage: errorMessageOf(err),
      backend,
      query,
      errorCode: errorCodeOf(err),
      transient: isTransient(err),
    }
  }

  return {
    backend,
    engine,

    async execute(query: string, callOptions: ExecuteOptions = {}): Promise<QueryOutcome> {
      const trace = callOptions.trace
      const signal = callOptions.signal ?? new AbortController().signal
      const start = Date.now()
      if (signal.aborted) return cancelledFailure(backend, query, signal)

      trace?.debug('connector query started', { engine })
      try {
        const rows: Row[] = await raceAbort(driver.run(query, signal), signal)
        const durationMs = Date.now() - start
        trace?.info('connector query succeeded', { engine, rowCount: rows.length, durationMs })
        return { kind: 'success', query, rows, backend, explanation: explainRows(rows.length), durationMs }
      } catch (err) {
        const durationMs = Date.now() - start
        const failure =
          err instanceof AbortedWhileWaiting ? cancelledFailure(backend, query, signal) : toFailure(query, err)
        trace?.error('connector query failed', {
          engine,
          durationMs,
          errorCode: failure.errorCode,
          transient: failure.transient,
          error: failure.errorMessage,
        })
        return failure
      }
    },

    ping: () => driver.ping(),
    close: () => driver.close(),
  }
}

export function cancelledFailure(backend: BackendId, query: string, signal: AbortSignal): QueryFailure {
  const { code, reason } = cancellationOf(signal)
  return { kind: 'failure', errorMessage: `Query cancelled: ${reason}`, backend, query, errorCode: code, transient: false }
}
