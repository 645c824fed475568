// Re-export types from validation package
export type {
  AggregateResult,
  BackendHealth,
  BackendId,
  HealthCheckResult,
  QueryFailure,
  QueryOutcome,
  QuerySuccess,
  SelectionMask,
} from '@querymesh/validation'
// Client
export type { ClientExecuteOptions, QueryMeshClient, QueryMeshClientConfig } from './client.js'
export { createQueryMeshClient } from './client.js'
// Error deserialization
export { deserializeError, QueryMeshError } from './errors.js'
