import type { BackendId } from './outcome.js'

export type EventLevel = 'debug' | 'info' | 'warn' | 'error'

export interface CorrelationIds {
  readonly requestId: string
  readonly correlationId: string
  readonly spanId: string
  readonly parentSpanId?: string | undefined
  readonly backend?: BackendId | undefined
}

export interface TraceEvent extends CorrelationIds {
  readonly timestamp: number
  readonly level: EventLevel
  readonly message: string
  readonly fields: Readonly<Record<string, unknown>>
}
