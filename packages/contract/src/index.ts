// Contract test suites

export type { ConnectorContractConfig } from './connectorContract.js'
export { describeConnectorContract } from './connectorContract.js'
