/** Delay in ms before retry number `retry` (1 = first retry). */
export type BackoffSchedule = (retry: number) => number

export interface ExponentialBackoffOptions {
  readonly baseDelayMs?: number | undefined
  readonly factor?: number | undefined
  readonly maxDelayMs?: number | undefined
  /** Fraction 0–1 of the delay that may be shaved off at random. */
  readonly jitter?: number | undefined
  readonly random?: (() => number) | undefined
}

/**
 * `min(maxDelayMs, baseDelayMs * factor^(retry - 1))`, then reduced by up to
 * `jitter` of itself. Defaults: 100ms, ×2, 5000ms cap, 0.2 jitter.
 */
export function exponentialBackoff(options: ExponentialBackoffOptions = {}): BackoffSchedule {
  const base = options.baseDelayMs ?? 100
  const factor = options.factor ?? 2
  const max = options.maxDelayMs ?? 5000
  const jitter = Math.min(Math.max(options.jitter ?? 0.2, 0), 1)
  const random = options.random ?? Math.random

  return (retry) => {
    const capped = Math.min(max, base * factor ** Math.max(retry - 1, 0))
    return Math.round(capped - capped * jitter * random())
  }
}

export function constantBackoff(delayMs: number): BackoffSchedule {
  return () => delayMs
}

export const noBackoff: BackoffSchedule = () => 0
