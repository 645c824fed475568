export type { Env, EnvConfig, RetryEnvConfig } from './config.js'
export { createConnectors, loadConfig } from './config.js'
export type { QueryMeshServer, ServerConfig } from './server.js'
export { CORRELATION_HEADER, createServer, errorToBody, errorToStatus, REQUEST_ID_HEADER } from './server.js'
