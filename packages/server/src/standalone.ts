import { beginCorrelation, createConsoleSink, exponentialBackoff } from '@querymesh/core'
import { createConnectors, loadConfig } from './config.js'
import { createServer } from './server.js'

const config = loadConfig()
const sink = createConsoleSink({ level: config.logLevel, service: 'querymesh-server' })

const server = await createServer({
  port: config.port,
  host: config.host,
  meshOptions: {
    connectors: createConnectors(config, sink),
    sink,
    timeoutMs: config.timeoutMs,
    retry: {
      maxAttempts: config.retry.maxAttempts,
      backoff: exponentialBackoff({ baseDelayMs: config.retry.baseDelayMs, maxDelayMs: config.retry.maxDelayMs }),
    },
  },
})

await server.start()

const lifecycle = beginCorrelation({ sink })
lifecycle.info('server listening', { url: server.url })

async function shutdown(signal: string): Promise<void> {
  lifecycle.info('server stopping', { signal })
  await server.stop()
  process.exit(0)
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      lifecycle.error('shutdown failed', { error: err instanceof Error ? err.message : String(err) })
      process.exit(1)
    })
  })
}
