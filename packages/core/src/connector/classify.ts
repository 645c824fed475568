import { ExecutionError } from '@querymesh/validation'

// Socket-level failures worth a retry against any engine
const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENOTFOUND',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
])

const TRANSIENT_MESSAGE =
  /timeout|timed out|connection (?:reset|refused|terminated|closed)|socket hang up|temporarily unavailable/i

/** Unwrap `ExecutionError('QUERY_FAILED')` to the driver error it carries. */
export function rootCause(err: unknown): unknown {
  if (err instanceof ExecutionError && err.details.code === 'QUERY_FAILED' && err.details.cause !== undefined) {
    return err.details.cause
  }
  return err
}

/** The driver's error code (SQLSTATE, ClickHouse code, Node socket code), if it has one. */
export function errorCodeOf(err: unknown): string | undefined {
  if (err instanceof ExecutionError && err.details.code !== 'QUERY_FAILED') return err.details.code
  const cause = rootCause(err)
  if (typeof cause === 'object' && cause !== null && 'code' in cause) {
    const code = cause.code
    if (typeof code === 'string' && code.length > 0) return code
    if (typeof code === 'number') return String(code)
  }
  return undefined
}

export function errorMessageOf(err: unknown): string {
  const cause = rootCause(err)
  if (err instanceof Error && cause !== err && cause instanceof Error) {
    return `${err.message}: ${cause.message}`
  }
  return err instanceof Error ? err.message : String(err)
}

/** Engine-agnostic transient check: socket codes and timeout/connection messages. */
export function isTransientError(err: unknown): boolean {
  const cause = rootCause(err)
  const code = errorCodeOf(cause)
  if (code !== undefined && TRANSIENT_NETWORK_CODES.has(code)) return true
  return cause instanceof Error && TRANSIENT_MESSAGE.test(cause.message)
}
