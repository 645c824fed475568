import type { ClickHouseConnectorConfig } from '@querymesh/connector-clickhouse'
import { createClickHouseConnector } from '@querymesh/connector-clickhouse'
import type { PostgresConnectorConfig } from '@querymesh/connector-postgres'
import { createPostgresConnector } from '@querymesh/connector-postgres'
import type { TrinoConnectorConfig } from '@querymesh/connector-trino'
import { createTrinoConnector } from '@querymesh/connector-trino'
import type { BackendConnector, ConfigErrorEntry, EventLevel, EventSink } from '@querymesh/core'
import { ConfigError, isEventLevel } from '@querymesh/core'

// ── Types ──────────────────────────────────────────────────────

export interface RetryEnvConfig {
  readonly maxAttempts: number
  readonly baseDelayMs: number
  readonly maxDelayMs: number
}

export interface EnvConfig {
  readonly port: number
  readonly host: string
  readonly logLevel: EventLevel
  readonly timeoutMs?: number | undefined
  readonly retry: RetryEnvConfig
  readonly postgres?: PostgresConnectorConfig | undefined
  readonly clickhouse?: ClickHouseConnectorConfig | undefined
  readonly trino?: TrinoConnectorConfig | undefined
}

export type Env = Readonly<Record<string, string | undefined>>

// ── Readers ────────────────────────────────────────────────────

function nonEmpty(env: Env, name: string): string | undefined {
  const value = env[name]?.trim()
  return value === undefined || value.length === 0 ? undefined : value
}

function readInt(env: Env, name: string, min: number, errors: ConfigErrorEntry[]): number | undefined {
  const raw = nonEmpty(env, name)
  if (raw === undefined) return undefined
  const value = Number(raw)
  if (!Number.isInteger(value) || value < min) {
    errors.push({
      code: 'INVALID_ENV',
      message: `${name} must be an integer >= ${min}, got '${raw}'`,
      details: { field: name, expected: `integer >= ${min}`, actual: raw },
    })
    return undefined
  }
  return value
}

// ── loadConfig ─────────────────────────────────────────────────

/** Read server settings from the environment; every problem is reported at once. */
export function loadConfig(env: Env = process.env): EnvConfig {
  const errors: ConfigErrorEntry[] = []

  const port = readInt(env, 'PORT', 0, errors) ?? 3000
  const host = nonEmpty(env, 'HOST') ?? '0.0.0.0'

  const rawLevel = nonEmpty(env, 'QUERYMESH_LOG_LEVEL') ?? 'info'
  let logLevel: EventLevel = 'info'
  if (isEventLevel(rawLevel)) {
    logLevel = rawLevel
  } else {
    errors.push({
      code: 'INVALID_ENV',
      message: `QUERYMESH_LOG_LEVEL must be one of debug, info, warn, error, got '${rawLevel}'`,
      details: { field: 'QUERYMESH_LOG_LEVEL', expected: 'debug | info | warn | error', actual: rawLevel },
    })
  }

  const timeoutMs = readInt(env, 'QUERYMESH_TIMEOUT_MS', 1, errors)
  const retry: RetryEnvConfig = {
    maxAttempts: readInt(env, 'QUERYMESH_RETRY_MAX_ATTEMPTS', 1, errors) ?? 3,
    baseDelayMs: readInt(env, 'QUERYMESH_RETRY_BASE_DELAY_MS', 0, errors) ?? 100,
    maxDelayMs: readInt(env, 'QUERYMESH_RETRY_MAX_DELAY_MS', 0, errors) ?? 5000,
  }

  const pgUrl = nonEmpty(env, 'QUERYMESH_PG_URL')
  const pgTimeoutMs = readInt(env, 'QUERYMESH_PG_TIMEOUT_MS', 1, errors)
  const postgres: PostgresConnectorConfig | undefined =
    pgUrl !== undefined ? { connectionString: pgUrl, timeoutMs: pgTimeoutMs ?? timeoutMs } : undefined

  const chUrl = nonEmpty(env, 'QUERYMESH_CLICKHOUSE_URL')
  const clickhouse: ClickHouseConnectorConfig | undefined =
    chUrl !== undefined
      ? {
          url: chUrl,
          username: nonEmpty(env, 'QUERYMESH_CLICKHOUSE_USER'),
          password: env.QUERYMESH_CLICKHOUSE_PASSWORD,
          database: nonEmpty(env, 'QUERYMESH_CLICKHOUSE_DATABASE'),
          timeoutMs,
        }
      : undefined

  const trinoUrl = nonEmpty(env, 'QUERYMESH_TRINO_URL')
  const trino: TrinoConnectorConfig | undefined =
    trinoUrl !== undefined
      ? {
          server: trinoUrl,
          user: nonEmpty(env, 'QUERYMESH_TRINO_USER'),
          catalog: nonEmpty(env, 'QUERYMESH_TRINO_CATALOG'),
          schema: nonEmpty(env, 'QUERYMESH_TRINO_SCHEMA'),
          timeoutMs,
        }
      : undefined

  if (postgres === undefined && clickhouse === undefined && trino === undefined) {
    errors.push({
      code: 'NO_BACKENDS_CONFIGURED',
      message: 'Set at least one of QUERYMESH_PG_URL, QUERYMESH_CLICKHOUSE_URL, QUERYMESH_TRINO_URL',
      details: {},
    })
  }

  if (errors.length > 0) throw new ConfigError(errors)

  return { port, host, logLevel, timeoutMs, retry, postgres, clickhouse, trino }
}

/** One connector per configured backend, in a fixed order. */
export function createConnectors(config: EnvConfig, sink?: EventSink | undefined): BackendConnector[] {
  const connectors: BackendConnector[] = []
  if (config.postgres !== undefined) connectors.push(createPostgresConnector({ ...config.postgres, sink }))
  if (config.clickhouse !== undefined) connectors.push(createClickHouseConnector(config.clickhouse))
  if (config.trino !== undefined) connectors.push(createTrinoConnector({ ...config.trino, sink }))
  return connectors
}
