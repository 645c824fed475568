import type { QueryFailure, QueryOutcome } from '@querymesh/validation'
import { ConfigError } from '@querymesh/validation'
import type { BackendConnector, ExecuteOptions } from '../types/interfaces.js'
import { sleep as defaultSleep } from '../util/abort.js'
import type { BackoffSchedule } from './backoff.js'
import { exponentialBackoff } from './backoff.js'

export type TransientPredicate = (failure: QueryFailure) => boolean

export interface RetryPolicyConfig {
  readonly maxAttempts?: number | undefined
  readonly isTransient?: TransientPredicate | undefined
  readonly backoff?: BackoffSchedule | undefined
  /** Abortable wait; replaced in tests. */
  readonly sleep?: ((ms: number, signal?: AbortSignal | undefined) => Promise<void>) | undefined
}

export interface RetryPolicy {
  readonly maxAttempts: number
  /**
   * Run `connector.execute` until it succeeds, fails with a non-transient error,
   * or the attempt budget is spent. The last real failure is returned unchanged.
   */
  wrap(connector: BackendConnector, query: string, options?: ExecuteOptions): Promise<QueryOutcome>
}

/** Reads the connector's own classification. */
export const isTransientFailure: TransientPredicate = (failure) => failure.transient

export const DEFAULT_MAX_ATTEMPTS = 3

export function createRetryPolicy(config: RetryPolicyConfig = {}): RetryPolicy {
  const maxAttempts = config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new ConfigError([
      {
        code: 'INVALID_RETRY',
        message: `maxAttempts must be an integer >= 1, got ${maxAttempts}`,
        details: { field: 'maxAttempts', expected: 'integer >= 1', actual: String(maxAttempts) },
      },
    ])
  }

  const isTransient = config.isTransient ?? isTransientFailure
  const backoff = config.backoff ?? exponentialBackoff()
  const sleep = config.sleep ?? defaultSleep

  return {
    maxAttempts,

    async wrap(connector, query, options = {}) {
      const { signal, trace } = options

      for (let attempt = 1; ; attempt++) {
        const outcome = await connector.execute(query, options)
        if (outcome.kind === 'success') {
          if (attempt > 1) trace?.info('retry succeeded', { attempt })
          return outcome
        }

        if (!isTransient(outcome)) {
          trace?.debug('retry skipped: failure is not transient', { attempt, errorCode: outcome.errorCode })
          return outcome
        }
        if (attempt >= maxAttempts) {
          trace?.warn('retry budget exhausted', { attempts: attempt, errorCode: outcome.errorCode })
          return outcome
        }
        if (signal?.aborted) return outcome

        const delayMs = backoff(attempt)
        trace?.info('retry scheduled', { attempt, nextAttempt: attempt + 1, delayMs, errorCode: outcome.errorCode })
        await sleep(delayMs, signal)
        if (signal?.aborted) return outcome
      }
    },
  }
}

/** Accept either a ready policy or its config. */
export function toRetryPolicy(retry: RetryPolicy | RetryPolicyConfig | undefined): RetryPolicy {
  if (retry !== undefined && 'wrap' in retry) return retry
  return createRetryPolicy(retry)
}
