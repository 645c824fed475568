import type { EventLevel, TraceEvent } from '@querymesh/validation'

export interface EventSink {
  emit(event: TraceEvent): void
}

const LEVEL_ORDER: Record<EventLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

export function isEventLevel(value: string): value is EventLevel {
  return Object.hasOwn(LEVEL_ORDER, value)
}

export function levelEnabled(level: EventLevel, threshold: EventLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold]
}

export const noopSink: EventSink = {
  emit() {},
}

// ── Console ────────────────────────────────────────────────────

export interface ConsoleSinkOptions {
  readonly level?: EventLevel | undefined
  readonly service?: string | undefined
  /** Defaults to `console.error` for `error` events and `console.log` otherwise. */
  readonly write?: ((line: string, level: EventLevel) => void) | undefined
}

/** One JSON line per event at or above `level`. */
export function createConsoleSink(options: ConsoleSinkOptions = {}): EventSink {
  const threshold = options.level ?? 'info'
  const service = options.service ?? 'querymesh'
  const write =
    options.write ??
    ((line: string, level: EventLevel) => {
      if (level === 'error') console.error(line)
      else console.log(line)
    })

  return {
    emit(event) {
      if (!levelEnabled(event.level, threshold)) return
      write(JSON.stringify(formatEvent(event, service)), event.level)
    },
  }
}

export function formatEvent(event: TraceEvent, service: string): Record<string, unknown> {
  return {
    time: new Date(event.timestamp).toISOString(),
    level: event.level,
    msg: event.message,
    service,
    requestId: event.requestId,
    correlationId: event.correlationId,
    spanId: event.spanId,
    ...(event.parentSpanId !== undefined ? { parentSpanId: event.parentSpanId } : {}),
    ...(event.backend !== undefined ? { backend: event.backend } : {}),
    ...event.fields,
  }
}

// ── Memory ─────────────────────────────────────────────────────

export interface MemorySink extends EventSink {
  readonly events: readonly TraceEvent[]
  clear(): void
}

export function createMemorySink(): MemorySink {
  const events: TraceEvent[] = []
  return {
    events,
    emit(event) {
      events.push(event)
    },
    clear() {
      events.length = 0
    },
  }
}

/** Fan events out to several sinks. */
export function combineSinks(...sinks: EventSink[]): EventSink {
  return {
    emit(event) {
      for (const sink of sinks) sink.emit(event)
    },
  }
}
