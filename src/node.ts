import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'http'
import { StatusCodes } from 'http-status-codes'
import type { NodeAdapterOptions } from './config'
import { HttpError, isHttpError } from './errors'
import { getLogger } from './logger'
import { fromError } from './response'
import { Router } from './router'

const DEFAULT_MAX_BODY_SIZE = 1024 * 1024

const addresses = new WeakMap<Request, string>()

/**
 * The socket address of the client that sent `req`, for requests that came in
 * through a Node app.
 */
export const remoteAddress = (req: Request): string | undefined => addresses.get(req)

export type NodeApp = Router & ((req: IncomingMessage, res: ServerResponse) => void)

/**
 * A router that doubles as a `node:http` request listener.
 */
export default function waymark(options: NodeAdapterOptions = {}): NodeApp {

  const { trustProxy = false, maxBodySize = DEFAULT_MAX_BODY_SIZE, ...routerOptions } = options
  const logger = options.logger ?? getLogger('node')
  const router = new Router(routerOptions)

  return new Proxy(router, {
    apply(_, __, [req, res]: [IncomingMessage, ServerResponse]) {
      void onRequest(req, res)
    }
  }) as NodeApp

  async function onRequest(nodeReq: IncomingMessage, nodeRes: ServerResponse): Promise<void> {

    const controller = new AbortController()
    const onClose = () => {
      if (!nodeRes.writableEnded) controller.abort()
    }
    nodeRes.once('close', onClose)

    let webReq: Request
    try {
      webReq = await createWebRequest(nodeReq, controller.signal, trustProxy, maxBodySize)
    } catch (err) {
      logger.warn({ err, url: nodeReq.url }, 'could not read request')
      const res = fromError(isHttpError(err) ? err : new HttpError(StatusCodes.BAD_REQUEST))
      nodeRes.statusCode = res.status
      nodeRes.setHeader('content-type', res.headers.get('content-type') ?? 'application/json')
      nodeRes.setHeader('connection', 'close')
      nodeRes.off('close', onClose)
      return void nodeRes.end(await res.text())
    }

    if (nodeReq.socket.remoteAddress != null) addresses.set(webReq, nodeReq.socket.remoteAddress)

    try {
      const webRes = await router.fetch(webReq)

      nodeRes.statusCode = webRes.status

      for (const [name, value] of webRes.headers) {
        if (name !== 'set-cookie') nodeRes.setHeader(name, value)
      }

      const cookies = webRes.headers.getSetCookie()
      if (cookies.length !== 0) nodeRes.setHeader('set-cookie', cookies)

      if (webRes.body == null) return void nodeRes.end()

      await webRes.body.pipeTo(new WritableStream({
        write: chunk => void nodeRes.write(chunk),
        close: () => void nodeRes.end()
      }))
    } catch (err) {
      logger.error({ err, method: nodeReq.method, url: nodeReq.url }, 'failed to send response')
      nodeRes.destroy()
    } finally {
      nodeRes.off('close', onClose)
    }
  }

}

const first = (value: string | string[] | undefined): string | undefined => {
  const header = Array.isArray(value) ? value[0] : value
  return header?.split(',')[0].trim() || undefined
}

const tooLarge = (limit: number) =>
  new HttpError(StatusCodes.REQUEST_TOO_LONG, `request body exceeds ${limit} bytes`)

async function readBody(req: IncomingMessage, limit: number): Promise<ArrayBuffer | undefined> {

  if (Number(req.headers['content-length']) > limit) throw tooLarge(limit)

  const chunks: Buffer[] = []
  let size = 0
  for await (const chunk of req) {
    size += chunk.length
    if (size > limit) throw tooLarge(limit)
    chunks.push(chunk)
  }
  if (size === 0) return undefined

  const body = new ArrayBuffer(size)
  const view = new Uint8Array(body)
  let offset = 0
  for (const chunk of chunks) {
    view.set(chunk, offset)
    offset += chunk.length
  }
  return body
}

export async function createWebRequest(
  req: IncomingMessage,
  signal: AbortSignal,
  trustProxy = false,
  maxBodySize = DEFAULT_MAX_BODY_SIZE
): Promise<Request> {

  const encrypted = 'encrypted' in req.socket && req.socket.encrypted === true
  const protocol = (trustProxy ? first(req.headers['x-forwarded-proto']) : undefined) ??
    (encrypted ? 'https' : 'http')
  const host = (trustProxy ? first(req.headers['x-forwarded-host']) : undefined) ??
    req.headers.host ??
    'localhost'

  const url = new URL(`${protocol}://${host}${req.url ?? '/'}`)
  const method = req.method ?? 'GET'
  const headers = new Headers()

  for (let i = 0; i < req.rawHeaders.length; i += 2) {
    headers.append(req.rawHeaders[i], req.rawHeaders[i + 1])
  }

  const body = method === 'GET' || method === 'HEAD'
    ? undefined
    : await readBody(req, maxBodySize)

  return new Request(url, { method, headers, body, signal })
}

export function listen(app: NodeApp, port: number, host?: string): Promise<Server> {
  app.freeze()
  const server = createServer(app)
  return new Promise((resolve, reject) => {
    server.once('error', reject)
    server.listen(port, host, () => {
      server.off('error', reject)
      resolve(server)
    })
  })
}

export function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => err == null ? resolve() : reject(err))
  })
}
