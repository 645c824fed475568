import type { BackendConnector, QueryOutcome } from '@querymesh/core'
import { ConnectionError, ExecutionError } from '@querymesh/core'
import { afterAll, beforeAll, describe, expect, it } from 'vitest'

// ── Types ──────────────────────────────────────────────────────

export interface ConnectorContractConfig {
  /** A query that returns ≥ 1 row (e.g. `'SELECT 1 AS n'`). */
  readonly validQuery: string
  /** A query the backend will reject (e.g. `'SELECT * FROM __nonexistent_table_xyz__'`). */
  readonly invalidQuery: string
}

// ── describeConnectorContract ──────────────────────────────────

export function describeConnectorContract(
  name: string,
  factory: () => BackendConnector,
  config: ConnectorContractConfig,
): void {
  describe(`ConnectorContract: ${name}`, () => {
    let connector: BackendConnector

    beforeAll(() => {
      connector = factory()
    })

    afterAll(async () => {
      await connector?.close()
    })

    it('C100: ping() resolves for a healthy connector', async () => {
      await expect(connector.ping()).resolves.toBeUndefined()
    })

    it('C101: execute() returns a success with row objects for a valid query', async () => {
      const outcome = await connector.execute(config.validQuery)
      expect(outcome.kind).toBe('success')
      if (outcome.kind !== 'success') return

      expect(outcome.backend).toBe(connector.backend)
      expect(outcome.query).toBe(config.validQuery)
      expect(outcome.rows.length).toBeGreaterThanOrEqual(1)
      for (const row of outcome.rows) {
        expect(typeof row).toBe('object')
        expect(row).not.toBeNull()
      }
      expect(outcome.explanation).toMatch(/^Successfully executed query returning \d+ rows?$/)
      expect(outcome.durationMs).toBeGreaterThanOrEqual(0)
    })

    it('C102: execute() resolves to a failure, never rejects, for an invalid query', async () => {
      const outcome = await connector.execute(config.invalidQuery)
      expect(outcome.kind).toBe('failure')
      if (outcome.kind !== 'failure') return

      expect(outcome.backend).toBe(connector.backend)
      expect(outcome.query).toBe(config.invalidQuery)
      expect(outcome.errorMessage.length).toBeGreaterThan(0)
      expect(outcome.transient).toBe(false)
    })

    it('C103: an already-aborted signal yields a non-transient cancelled failure', async () => {
      const controller = new AbortController()
      controller.abort('contract check')

      const outcome = await connector.execute(config.validQuery, { signal: controller.signal })
      expect(outcome).toMatchObject({
        kind: 'failure',
        errorMessage: 'Query cancelled: contract check',
        errorCode: 'QUERY_CANCELLED',
        transient: false,
      })
    })

    it('C104: concurrent calls settle independently', async () => {
      const outcomes: QueryOutcome[] = await Promise.all([
        connector.execute(config.validQuery),
        connector.execute(config.invalidQuery),
        connector.execute(config.validQuery),
      ])
      expect(outcomes.map((o) => o.kind)).toEqual(['success', 'failure', 'success'])
    })

    it('C105: close() resolves without error', async () => {
      const temp = factory()
      await expect(temp.close()).resolves.toBeUndefined()
    })

    it('C106: ping() throws ConnectionError after close', async () => {
      const temp = factory()
      await temp.close()
      try {
        await temp.ping()
        // Stateless connectors (e.g. Trino REST) may not throw; acceptable
      } catch (err) {
        expect(err instanceof ConnectionError || err instanceof ExecutionError).toBe(true)
      }
    })
  })
}
