import { randomUUID } from 'node:crypto'
import type { BackendId, CorrelationIds, EventLevel, TraceEvent } from '@querymesh/validation'
import type { EventSink } from './sinks.js'
import { noopSink } from './sinks.js'

export interface BeginCorrelationOptions {
  readonly sink?: EventSink | undefined
  /** Reused when the request belongs to a larger logical operation. */
  readonly correlationId?: string | undefined
  readonly idGenerator?: (() => string) | undefined
  /** Keep the call tree's events for the debug log. */
  readonly collect?: boolean | undefined
}

/**
 * Request-scoped identity handed explicitly through the call tree.
 * Children share the request and correlation ids and get their own span.
 */
export interface CorrelationHandle {
  current(): CorrelationIds
  child(backend: BackendId): CorrelationHandle
  debug(message: string, fields?: Record<string, unknown>): void
  info(message: string, fields?: Record<string, unknown>): void
  warn(message: string, fields?: Record<string, unknown>): void
  error(message: string, fields?: Record<string, unknown>): void
  /**
   * Tear the scope down. Returns the collected events (empty unless `collect`);
   * later events still reach the sink but are no longer collected.
   */
  end(): readonly TraceEvent[]
}

interface Scope {
  readonly sink: EventSink
  readonly nextId: () => string
  readonly collected: TraceEvent[] | undefined
  ended: boolean
}

export function beginCorrelation(options: BeginCorrelationOptions = {}): CorrelationHandle {
  const nextId = options.idGenerator ?? randomUUID
  const scope: Scope = {
    sink: options.sink ?? noopSink,
    nextId,
    collected: options.collect === true ? [] : undefined,
    ended: false,
  }
  const requestId = nextId()
  const ids: CorrelationIds = {
    requestId,
    correlationId: options.correlationId ?? nextId(),
    spanId: nextId(),
  }
  return makeHandle(scope, ids)
}

function makeHandle(scope: Scope, ids: CorrelationIds): CorrelationHandle {
  const emit = (level: EventLevel, message: string, fields: Record<string, unknown> = {}): void => {
    const event: TraceEvent = { ...ids, timestamp: Date.now(), level, message, fields }
    if (scope.collected !== undefined && !scope.ended) scope.collected.push(event)
    scope.sink.emit(event)
  }

  return {
    current: () => ids,
    child(backend) {
      return makeHandle(scope, {
        requestId: ids.requestId,
        correlationId: ids.correlationId,
        spanId: scope.nextId(),
        parentSpanId: ids.spanId,
        backend,
      })
    },
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
    end() {
      scope.ended = true
      return Object.freeze([...(scope.collected ?? [])])
    },
  }
}
