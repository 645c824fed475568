// Re-export types from validation package
export type {
  AggregateResult,
  BackendEngine,
  BackendHealth,
  BackendId,
  CallerErrorCode,
  ConfigErrorEntry,
  ConnectionErrorDetails,
  CorrelationIds,
  EventLevel,
  ExecutionErrorDetails,
  HealthCheckResult,
  QueryFailure,
  QueryOutcome,
  QuerySuccess,
  Row,
  SelectionMask,
  TraceEvent,
  UnreachableBackend,
} from '@querymesh/validation'
// Re-export validation functions and classes
export {
  ALL_BACKENDS,
  CallerError,
  ConfigError,
  ConnectionError,
  ExecutionError,
  isFailure,
  isSuccess,
  parseSelection,
  QueryMeshError,
  resolveSelection,
  serializeError,
  validateMeshConfig,
  validateSelection,
} from '@querymesh/validation'
// Connectors
export { errorCodeOf, errorMessageOf, isTransientError, rootCause } from './connector/classify.js'
export type { DefineConnectorOptions } from './connector/defineConnector.js'
export { cancelledFailure, defineConnector, explainRows } from './connector/defineConnector.js'
export type { MemoryConnectorOptions } from './connector/memory.js'
export { createMemoryConnector } from './connector/memory.js'
// Pipeline
export type { CreateQueryMeshOptions, ExecuteCallOptions, QueryMesh } from './pipeline.js'
export { createQueryMesh } from './pipeline.js'
// Retry
export type { BackoffSchedule, ExponentialBackoffOptions } from './retry/backoff.js'
export { constantBackoff, exponentialBackoff, noBackoff } from './retry/backoff.js'
export type { RetryPolicy, RetryPolicyConfig, TransientPredicate } from './retry/policy.js'
export { createRetryPolicy, DEFAULT_MAX_ATTEMPTS, isTransientFailure, toRetryPolicy } from './retry/policy.js'
// Tracing
export type { BeginCorrelationOptions, CorrelationHandle } from './trace/correlation.js'
export { beginCorrelation } from './trace/correlation.js'
export type { ConsoleSinkOptions, EventSink, MemorySink } from './trace/sinks.js'
export {
  combineSinks,
  createConsoleSink,
  createMemorySink,
  formatEvent,
  isEventLevel,
  levelEnabled,
  noopSink,
} from './trace/sinks.js'
export { withSpan } from './trace/span.js'
// Public interfaces
export type { BackendConnector, ConnectorDriver, ExecuteOptions } from './types/interfaces.js'
export type { Cancellation } from './util/abort.js'
export { AbortedWhileWaiting, cancellationOf, linkAbort, raceAbort, sleep, TimeoutReason } from './util/abort.js'
