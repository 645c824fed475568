import { serializeError } from '@querymesh/validation'
import type { CorrelationHandle } from './correlation.js'

/**
 * Run `fn` as a named span: emits `<name> started`, then `<name> finished`
 * (with `durationMs`) or `<name> failed` before rethrowing.
 */
export async function withSpan<T>(
  trace: CorrelationHandle,
  name: string,
  fn: (trace: CorrelationHandle) => Promise<T>,
  fields: Record<string, unknown> = {},
): Promise<T> {
  const start = Date.now()
  trace.debug(`${name} started`, fields)
  try {
    const result = await fn(trace)
    trace.debug(`${name} finished`, { ...fields, durationMs: Date.now() - start })
    return result
  } catch (err) {
    trace.error(`${name} failed`, { ...fields, durationMs: Date.now() - start, error: serializeError(err) })
    throw err
  }
}
