import { CallerError } from './errors.js'
import type { BackendId } from './types/outcome.js'
import type { SelectionMask } from './types/selection.js'

/**
 * Check a selection against the registered backends without resolving it.
 * Returns the error `resolveSelection` would throw, or `null`.
 */
export function validateSelection(selection: SelectionMask, registered: readonly BackendId[]): CallerError | null {
  try {
    resolveSelection(selection, registered)
    return null
  } catch (err) {
    if (err instanceof CallerError) return err
    throw err
  }
}

/**
 * Resolve a selection mask to the concrete backends to invoke, in registration
 * order. Throws `CallerError` for unknown names and for an empty result.
 */
export function resolveSelection(selection: SelectionMask, registered: readonly BackendId[]): readonly BackendId[] {
  if (selection.mode === 'all') {
    if (registered.length === 0) throw new CallerError('EMPTY_SELECTION', undefined, { registered })
    return [...registered]
  }

  const named = new Set(selection.backends)
  const known = new Set(registered)
  const unknown = [...named].filter((b) => !known.has(b))
  if (unknown.length > 0) {
    throw new CallerError('UNKNOWN_BACKEND', undefined, { backends: unknown, registered })
  }

  const resolved =
    selection.mode === 'include' ? registered.filter((b) => named.has(b)) : registered.filter((b) => !named.has(b))

  if (resolved.length === 0) {
    throw new CallerError('EMPTY_SELECTION', undefined, { backends: [...named], registered })
  }
  return resolved
}

/** Narrow an untyped value (e.g. a request body field) to a `SelectionMask`. */
export function parseSelection(value: unknown): SelectionMask {
  if (value === undefined || value === null) return { mode: 'all' }
  if (typeof value !== 'object' || !('mode' in value)) {
    throw new CallerError('INVALID_SELECTION')
  }

  const mode = value.mode
  if (mode === 'all') return { mode: 'all' }
  if (mode !== 'include' && mode !== 'exclude') {
    throw new CallerError('INVALID_SELECTION')
  }

  const backends = 'backends' in value ? value.backends : undefined
  if (!Array.isArray(backends) || !backends.every((b): b is string => typeof b === 'string')) {
    throw new CallerError('INVALID_SELECTION', `Selection mode '${mode}' requires a backends array of strings`)
  }
  return { mode, backends }
}
