// Config validation
export type { MeshConfigInput } from './configValidation.js'
export { isValidTimeout, MAX_TIMEOUT_MS, validateBackendId, validateMeshConfig } from './configValidation.js'

// Errors
export type {
  CallerErrorCode,
  CallerErrorDetails,
  ConfigErrorEntry,
  ConnectionErrorCode,
  ConnectionErrorDetails,
  ExecutionErrorDetails,
  UnreachableBackend,
} from './errors.js'
export {
  CallerError,
  ConfigError,
  ConnectionError,
  ExecutionError,
  QueryMeshError,
  serializeError,
} from './errors.js'

// Selection
export { parseSelection, resolveSelection, validateSelection } from './selection.js'

// Types: outcome
export type { BackendEngine, BackendId, QueryFailure, QueryOutcome, QuerySuccess, Row } from './types/outcome.js'
export { isFailure, isSuccess } from './types/outcome.js'
// Types: result
export type { AggregateResult, BackendHealth, HealthCheckResult } from './types/result.js'
// Types: selection
export type { SelectionMask } from './types/selection.js'
export { ALL_BACKENDS } from './types/selection.js'
// Types: trace
export type { CorrelationIds, EventLevel, TraceEvent } from './types/trace.js'
