import { createServer as createHttpServer, type IncomingMessage, type ServerResponse } from 'node:http'
import type { CreateQueryMeshOptions, QueryMesh } from '@querymesh/core'
import {
  CallerError,
  ConfigError,
  ConnectionError,
  createQueryMesh,
  parseSelection,
  QueryMeshError,
} from '@querymesh/core'

// ── Types ──────────────────────────────────────────────────────

export interface ServerConfig {
  readonly port?: number | undefined
  readonly host?: string | undefined
  readonly meshOptions: CreateQueryMeshOptions
}

export interface QueryMeshServer {
  readonly url: string
  start(): Promise<void>
  stop(): Promise<void>
}

export const CORRELATION_HEADER = 'x-correlation-id'
export const REQUEST_ID_HEADER = 'x-request-id'

class HttpError extends Error {
  readonly status: number
  readonly code: string
  constructor(status: number, code: string, message: string) {
    super(message)
    this.name = 'HttpError'
    this.status = status
    this.code = code
  }
}

// ── Error mapping ──────────────────────────────────────────────

export function errorToStatus(err: unknown): number {
  if (err instanceof HttpError) return err.status
  if (err instanceof CallerError || err instanceof ConfigError) return 400
  if (err instanceof ConnectionError) return 503
  return 500
}

export function errorToBody(err: unknown): object {
  if (err instanceof HttpError) return { code: err.code, message: err.message }
  if (err instanceof QueryMeshError) return err.toJSON()
  const msg = err instanceof Error ? err.message : String(err)
  return { code: 'INTERNAL_ERROR', message: msg }
}

// ── Helpers ────────────────────────────────────────────────────

function readBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = []
    req.on('data', (chunk: Buffer) => chunks.push(chunk))
    req.on('end', () => {
      try {
        const raw = Buffer.concat(chunks).toString('utf-8')
        resolve(raw.length > 0 ? JSON.parse(raw) : undefined)
      } catch {
        reject(new HttpError(400, 'INVALID_JSON', 'Request body is not valid JSON'))
      }
    })
    req.on('error', reject)
  })
}

function respond(res: ServerResponse, status: number, body: unknown, headers: Record<string, string> = {}): void {
  const json = JSON.stringify(body)
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(json),
    ...headers,
  })
  res.end(json)
}

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name]
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

interface QueryRequest {
  readonly query: string
  readonly selection: unknown
  readonly debug: boolean
}

function parseQueryRequest(body: unknown): QueryRequest {
  if (typeof body !== 'object' || body === null || !('query' in body) || typeof body.query !== 'string') {
    throw new HttpError(400, 'INVALID_BODY', 'Request body must be an object with a string query')
  }
  const selection = 'selection' in body ? body.selection : undefined
  const debug = 'debug' in body && body.debug === true
  return { query: body.query, selection, debug }
}

// ── Server factory ─────────────────────────────────────────────

export async function createServer(config: ServerConfig): Promise<QueryMeshServer> {
  const port = config.port ?? 3000
  const host = config.host ?? '0.0.0.0'

  const mesh: QueryMesh = await createQueryMesh(config.meshOptions)

  // A client that goes away cancels its in-flight fan-out
  function disconnectSignal(req: IncomingMessage, res: ServerResponse): AbortSignal {
    const controller = new AbortController()
    res.on('close', () => {
      if (!res.writableFinished) controller.abort('client disconnected')
    })
    return controller.signal
  }

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? 'GET'
    const url = (req.url ?? '/').split('?')[0]

    try {
      if (method === 'GET' && url === '/health') {
        const result = await mesh.healthCheck()
        respond(res, 200, result)
      } else if (method === 'POST' && url === '/query') {
        const request = parseQueryRequest(await readBody(req))
        const selection = parseSelection(request.selection)
        const result = await mesh.execute(request.query, selection, {
          correlationId: headerValue(req, CORRELATION_HEADER),
          debug: request.debug,
          signal: disconnectSignal(req, res),
        })
        respond(res, 200, result, {
          [REQUEST_ID_HEADER]: result.requestId,
          [CORRELATION_HEADER]: result.correlationId,
        })
      } else {
        respond(res, 404, { code: 'NOT_FOUND', message: `${method} ${url} not found` })
      }
    } catch (err) {
      const status = errorToStatus(err)
      respond(res, status, errorToBody(err))
    }
  }

  const server = createHttpServer((req: IncomingMessage, res: ServerResponse) => {
    handleRequest(req, res).catch((err: unknown) => {
      if (!res.headersSent) {
        respond(res, 500, { code: 'INTERNAL_ERROR', message: err instanceof Error ? err.message : String(err) })
      } else {
        res.destroy(err instanceof Error ? err : undefined)
      }
    })
  })

  const displayHost = host === '0.0.0.0' ? 'localhost' : host

  const result = {
    url: `http://${displayHost}:${port}`,
    start() {
      return new Promise<void>((resolve, reject) => {
        server.on('error', reject)
        server.listen(port, host, () => {
          const addr = server.address()
          if (addr && typeof addr === 'object') {
            result.url = `http://${displayHost}:${addr.port}`
          }
          resolve()
        })
      })
    },
    async stop() {
      await new Promise<void>((resolve, reject) => {
        server.close((err: Error | undefined) => (err ? reject(err) : resolve()))
      })
      await mesh.close()
    },
  }

  return result
}
