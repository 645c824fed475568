import type { ConfigErrorEntry } from './errors.js'
import { ConfigError } from './errors.js'

// --- Backend id Validation ---

const BACKEND_ID_REGEX = /^[a-z][a-z0-9-]*$/

export function validateBackendId(id: string): string | null {
  if (id.length === 0 || id.length > 64) {
    return `backend id must be 1–64 characters, got ${id.length}`
  }
  if (!BACKEND_ID_REGEX.test(id)) {
    return `backend id must match ^[a-z][a-z0-9-]*$, got '${id}'`
  }
  return null
}

// --- Timeout Validation ---

/** Largest delay `setTimeout` honours; anything above fires after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647

export function isValidTimeout(ms: number): boolean {
  return Number.isFinite(ms) && ms > 0 && ms <= MAX_TIMEOUT_MS
}

// --- Mesh Config Validation ---

export interface MeshConfigInput {
  readonly backends: readonly string[]
  readonly maxAttempts?: number | undefined
  readonly timeoutMs?: number | undefined
}

export function validateMeshConfig(config: MeshConfigInput): ConfigError | null {
  const errors: ConfigErrorEntry[] = []

  if (config.backends.length === 0) {
    errors.push({
      code: 'NO_CONNECTORS',
      message: 'At least one connector must be registered',
      details: { expected: '>= 1', actual: '0' },
    })
  }

  const seen = new Set<string>()
  for (const id of config.backends) {
    const idErr = validateBackendId(id)
    if (idErr !== null) {
      errors.push({
        code: 'INVALID_BACKEND_ID',
        message: `Backend '${id}': ${idErr}`,
        details: { backend: id, field: 'backend', actual: id },
      })
    }

    if (seen.has(id)) {
      errors.push({
        code: 'DUPLICATE_BACKEND',
        message: `Duplicate backend id '${id}'`,
        details: { backend: id, field: 'backend', actual: id },
      })
    } else {
      seen.add(id)
    }
  }

  if (config.maxAttempts !== undefined && (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1)) {
    errors.push({
      code: 'INVALID_RETRY',
      message: `maxAttempts must be an integer >= 1, got ${config.maxAttempts}`,
      details: { field: 'maxAttempts', expected: 'integer >= 1', actual: String(config.maxAttempts) },
    })
  }

  if (config.timeoutMs !== undefined && !isValidTimeout(config.timeoutMs)) {
    errors.push({
      code: 'INVALID_TIMEOUT',
      message: `timeoutMs must be a positive number <= ${MAX_TIMEOUT_MS}, got ${config.timeoutMs}`,
      details: { field: 'timeoutMs', expected: `> 0 and <= ${MAX_TIMEOUT_MS}`, actual: String(config.timeoutMs) },
    })
  }

  return errors.length > 0 ? new ConfigError(errors) : null
}
