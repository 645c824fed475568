// ── Abort helpers ──────────────────────────────────────────────

export class TimeoutReason extends Error {
  readonly timeoutMs: number

  constructor(timeoutMs: number) {
    super(`timed out after ${timeoutMs}ms`)
    this.name = 'TimeoutError'
    this.timeoutMs = timeoutMs
  }
}

export interface Cancellation {
  readonly code: 'QUERY_CANCELLED' | 'QUERY_TIMEOUT'
  readonly reason: string
}

/** Describe why a signal was aborted. */
export function cancellationOf(signal: AbortSignal): Cancellation {
  const reason: unknown = signal.reason
  if (reason instanceof Error) {
    return { code: reason.name === 'TimeoutError' ? 'QUERY_TIMEOUT' : 'QUERY_CANCELLED', reason: reason.message }
  }
  if (typeof reason === 'string' && reason.length > 0) return { code: 'QUERY_CANCELLED', reason }
  return { code: 'QUERY_CANCELLED', reason: 'aborted' }
}

export class AbortedWhileWaiting extends Error {
  constructor() {
    super('aborted')
    this.name = 'AbortedWhileWaiting'
  }
}

/**
 * Settle with `promise`, or reject with `AbortedWhileWaiting` as soon as `signal`
 * aborts. The losing promise keeps running; its result is dropped.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new AbortedWhileWaiting())
    if (signal.aborted) onAbort()
    else signal.addEventListener('abort', onAbort, { once: true })

    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(err)
      },
    )
  })
}

/** Wait `ms`, resolving early when `signal` aborts. */
export function sleep(ms: number, signal?: AbortSignal | undefined): Promise<void> {
  return new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const done = (): void => {
      clearTimeout(timer)
      signal?.removeEventListener('abort', done)
      resolve()
    }
    const timer = setTimeout(done, ms)
    signal?.addEventListener('abort', done, { once: true })
  })
}

/** Forward aborts from `parent` to `child`. Returns the unlink function. */
export function linkAbort(parent: AbortSignal, child: AbortController): () => void {
  if (parent.aborted) {
    child.abort(parent.reason)
    return () => {}
  }
  const forward = (): void => child.abort(parent.reason)
  parent.addEventListener('abort', forward, { once: true })
  return () => parent.removeEventListener('abort', forward)
}
