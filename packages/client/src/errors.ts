import type { CallerErrorCode, CallerErrorDetails, ConfigErrorEntry, ConnectionErrorCode } from '@querymesh/validation'
import { CallerError, ConfigError, ConnectionError, QueryMeshError } from '@querymesh/validation'

const CALLER_CODES: ReadonlySet<string> = new Set<CallerErrorCode>([
  'EMPTY_QUERY',
  'EMPTY_SELECTION',
  'UNKNOWN_BACKEND',
  'INVALID_SELECTION',
  'INVALID_TIMEOUT',
  'MESH_CLOSED',
])
const CONNECTION_CODES: ReadonlySet<string> = new Set<ConnectionErrorCode>([
  'CONNECTION_FAILED',
  'NETWORK_ERROR',
  'REQUEST_TIMEOUT',
])
const CONFIG_ENTRY_CODES: ReadonlySet<string> = new Set<ConfigErrorEntry['code']>([
  'NO_CONNECTORS',
  'DUPLICATE_BACKEND',
  'INVALID_BACKEND_ID',
  'INVALID_RETRY',
  'INVALID_TIMEOUT',
  'INVALID_ENV',
  'NO_BACKENDS_CONFIGURED',
])

function isCallerCode(code: string): code is CallerErrorCode {
  return CALLER_CODES.has(code)
}

function isConnectionCode(code: string): code is ConnectionErrorCode {
  return CONNECTION_CODES.has(code)
}

function isConfigEntryCode(code: string): code is ConfigErrorEntry['code'] {
  return CONFIG_ENTRY_CODES.has(code)
}

function stringField(value: object, key: string): string | undefined {
  const field: unknown = Reflect.get(value, key)
  return typeof field === 'string' ? field : undefined
}

function stringArrayField(value: object, key: string): string[] | undefined {
  const field: unknown = Reflect.get(value, key)
  return Array.isArray(field) && field.every((v): v is string => typeof v === 'string') ? field : undefined
}

function objectField(value: object, key: string): object | undefined {
  const field: unknown = Reflect.get(value, key)
  return typeof field === 'object' && field !== null ? field : undefined
}

function configEntries(body: object): ConfigErrorEntry[] {
  const raw: unknown = Reflect.get(body, 'errors')
  if (!Array.isArray(raw)) return []
  const entries: ConfigErrorEntry[] = []
  for (const item of raw) {
    if (typeof item !== 'object' || item === null) continue
    const code = stringField(item, 'code')
    if (code === undefined || !isConfigEntryCode(code)) continue
    const details = objectField(item, 'details') ?? {}
    entries.push({
      code,
      message: stringField(item, 'message') ?? '',
      details: {
        backend: stringField(details, 'backend'),
        field: stringField(details, 'field'),
        expected: stringField(details, 'expected'),
        actual: stringField(details, 'actual'),
      },
    })
  }
  return entries
}

/**
 * Reconstruct a typed error from a JSON body returned by the server.
 * Maps the `code` field to the correct error class.
 */
export function deserializeError(body: unknown): Error {
  if (typeof body !== 'object' || body === null) return new Error('Unknown error')

  const code = stringField(body, 'code') ?? ''
  const message = stringField(body, 'message') ?? 'Unknown error'
  const details = objectField(body, 'details') ?? {}

  if (code === 'CONFIG_INVALID') {
    return new ConfigError(configEntries(body))
  }

  if (isCallerCode(code)) {
    const callerDetails: CallerErrorDetails = {
      backends: stringArrayField(details, 'backends'),
      registered: stringArrayField(details, 'registered'),
    }
    return new CallerError(code, message, callerDetails)
  }

  if (isConnectionCode(code)) {
    const unreachable: unknown = Reflect.get(details, 'unreachable')
    if (Array.isArray(unreachable)) {
      const backends = unreachable.flatMap((u: unknown) => {
        const backend = typeof u === 'object' && u !== null ? stringField(u, 'backend') : undefined
        return backend !== undefined ? [{ backend }] : []
      })
      return new ConnectionError(code, message, { unreachable: backends })
    }
    const timeoutMs: unknown = Reflect.get(details, 'timeoutMs')
    return new ConnectionError(code, message, {
      url: stringField(details, 'url'),
      timeoutMs: typeof timeoutMs === 'number' ? timeoutMs : undefined,
    })
  }

  if (code.length > 0) return new QueryMeshError(code, message)
  return new Error(message)
}

export { QueryMeshError }
