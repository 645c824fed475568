import type { BackendEngine, BackendId } from './types/outcome.js'

// --- Base Error ---

export class QueryMeshError extends Error {
  readonly code: string

  constructor(code: string, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'QueryMeshError'
    this.code = code
  }

  toJSON(): Record<string, unknown> {
    const json: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    }
    if (this.cause !== undefined) {
      json.cause = serializeError(this.cause)
    }
    return json
  }
}

// --- Caller Error ---

export type CallerErrorCode =
  | 'EMPTY_QUERY'
  | 'EMPTY_SELECTION'
  | 'UNKNOWN_BACKEND'
  | 'INVALID_SELECTION'
  | 'INVALID_TIMEOUT'
  | 'MESH_CLOSED'

export interface CallerErrorDetails {
  backends?: readonly BackendId[] | undefined
  registered?: readonly BackendId[] | undefined
}

/**
 * Invalid invocation of the mesh. Raised before any backend is dispatched and
 * never retried; the only error `execute()` throws.
 */
export class CallerError extends QueryMeshError {
  declare readonly code: CallerErrorCode
  readonly details: CallerErrorDetails

  constructor(code: CallerErrorCode, message?: string | undefined, details: CallerErrorDetails = {}) {
    super(code, message ?? defaultCallerMessage(code, details))
    this.name = 'CallerError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    }
  }
}

// --- Config Error ---

export interface ConfigErrorEntry {
  code:
    | 'NO_CONNECTORS'
    | 'DUPLICATE_BACKEND'
    | 'INVALID_BACKEND_ID'
    | 'INVALID_RETRY'
    | 'INVALID_TIMEOUT'
    | 'INVALID_ENV'
    | 'NO_BACKENDS_CONFIGURED'
  message: string
  details: {
    backend?: string | undefined
    field?: string | undefined
    expected?: string | undefined
    actual?: string | undefined
  }
}

export class ConfigError extends QueryMeshError {
  declare readonly code: 'CONFIG_INVALID'
  readonly errors: readonly ConfigErrorEntry[]

  constructor(errors: readonly ConfigErrorEntry[]) {
    super('CONFIG_INVALID', `Config invalid: ${errors.length} error${errors.length === 1 ? '' : 's'}`)
    this.name = 'ConfigError'
    this.errors = errors
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      errors: this.errors,
    }
  }
}

// --- Connection Error ---

export interface UnreachableBackend {
  backend: BackendId
  engine?: BackendEngine | undefined
  cause?: Error | undefined
}

export type ConnectionErrorDetails =
  | { unreachable: readonly UnreachableBackend[] }
  | { url?: string | undefined; timeoutMs?: number | undefined }

export type ConnectionErrorCode = 'CONNECTION_FAILED' | 'NETWORK_ERROR' | 'REQUEST_TIMEOUT'

export class ConnectionError extends QueryMeshError {
  declare readonly code: ConnectionErrorCode
  readonly details: ConnectionErrorDetails

  constructor(code: ConnectionErrorCode, message: string, details: ConnectionErrorDetails, cause?: Error | undefined) {
    super(code, message, cause ? { cause } : undefined)
    this.name = 'ConnectionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: serializeConnectionDetails(this.details),
    }
  }
}

// --- Execution Error ---

export type ExecutionErrorDetails =
  | {
      code: 'QUERY_FAILED'
      backend: BackendId
      engine: BackendEngine
      query: string
      cause?: Error | undefined
    }
  | {
      code: 'QUERY_TIMEOUT'
      backend: BackendId
      engine: BackendEngine
      query: string
      timeoutMs: number
    }
  | {
      code: 'QUERY_CANCELLED'
      backend: BackendId
      engine: BackendEngine
      query: string
      reason: string
    }

/**
 * Thrown by connector drivers. `defineConnector` turns it into a failure
 * outcome, so it never reaches the caller of `execute()`.
 */
export class ExecutionError extends QueryMeshError {
  declare readonly code: ExecutionErrorDetails['code']
  readonly details: ExecutionErrorDetails

  constructor(details: ExecutionErrorDetails, cause?: Error | undefined) {
    super(details.code, defaultExecutionMessage(details), cause ? { cause } : undefined)
    this.name = 'ExecutionError'
    this.details = details
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: serializeExecutionDetails(this.details),
    }
  }
}

// --- Helpers ---

export function serializeError(err: unknown): Record<string, unknown> | unknown {
  if (err instanceof QueryMeshError) {
    return err.toJSON()
  }
  if (err instanceof Error) {
    const json: Record<string, unknown> = {
      message: err.message,
      name: err.name,
    }
    if (err.cause !== undefined) {
      json.cause = serializeError(err.cause)
    }
    return json
  }
  return err
}

function serializeConnectionDetails(details: ConnectionErrorDetails): unknown {
  if ('unreachable' in details) {
    return {
      unreachable: details.unreachable.map((u) => ({
        backend: u.backend,
        ...(u.engine !== undefined ? { engine: u.engine } : {}),
        ...(u.cause !== undefined ? { cause: serializeError(u.cause) } : {}),
      })),
    }
  }
  return details
}

function serializeExecutionDetails(details: ExecutionErrorDetails): unknown {
  if (details.code === 'QUERY_FAILED' && details.cause !== undefined) {
    const { cause, ...rest } = details
    return { ...rest, cause: serializeError(cause) }
  }
  return details
}

function defaultCallerMessage(code: CallerErrorCode, details: CallerErrorDetails): string {
  switch (code) {
    case 'EMPTY_QUERY':
      return 'Query text must not be empty'
    case 'EMPTY_SELECTION':
      return 'Selection resolves to no backends'
    case 'UNKNOWN_BACKEND':
      return `Unknown backends: ${(details.backends ?? []).join(', ')}`
    case 'INVALID_SELECTION':
      return 'Selection must be { mode: "all" | "include" | "exclude" }'
    case 'INVALID_TIMEOUT':
      return 'timeoutMs must be a positive number'
    case 'MESH_CLOSED':
      return 'Query mesh is closed'
  }
}

function defaultExecutionMessage(details: ExecutionErrorDetails): string {
  switch (details.code) {
    case 'QUERY_FAILED':
      return `Query failed on ${details.engine} backend: ${details.backend}`
    case 'QUERY_TIMEOUT':
      return `Query timeout on ${details.engine} backend: ${details.backend} (${details.timeoutMs}ms)`
    case 'QUERY_CANCELLED':
      return `Query cancelled on ${details.engine} backend: ${details.backend} (${details.reason})`
  }
}
