import type { BackendId } from './outcome.js'

export type SelectionMask =
  | { readonly mode: 'all' }
  | { readonly mode: 'include'; readonly backends: readonly BackendId[] }
  | { readonly mode: 'exclude'; readonly backends: readonly BackendId[] }

export const ALL_BACKENDS: SelectionMask = { mode: 'all' }
