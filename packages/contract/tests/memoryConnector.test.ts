import { createMemoryConnector } from '@querymesh/core'
import { describeConnectorContract } from '../src/index.js'

describeConnectorContract('memory', () => createMemoryConnector({ backend: 'relational', rows: [{ n: 1 }] }), {
  validQuery: 'SELECT 1 AS n',
  invalidQuery: 'SELECT * FROM __fail__',
})

describeConnectorContract(
  'memory (delayed)',
  () => createMemoryConnector({ backend: 'warehouse', rows: [{ n: 1 }, { n: 2 }], delayMs: 5 }),
  {
    validQuery: 'SELECT n FROM numbers',
    invalidQuery: 'SELECT __fail__',
  },
)
