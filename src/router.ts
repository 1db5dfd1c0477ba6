import type { Logger } from 'pino'
import { StatusCodes } from 'http-status-codes'
import { compose } from './compose'
import type { RouterOptions } from './config'
import {
  ConflictError,
  FrozenRouterError,
  HttpError,
  MiddlewareFault,
  RequestAbortedError,
  isHttpError
} from './errors'
import { getLogger } from './logger'
import { joinPaths, parsePattern, tokenize, type ParamKey } from './pattern'
import { fromError, json } from './response'
import type {
  ErrorHandler,
  Handler,
  MatchResult,
  Middleware,
  NotFoundHandler,
  Params,
  RequestHandlers
} from './types'

export const METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'] as const

export class Endpoint {

  constructor(
    readonly method: string,
    readonly pattern: string,
    private keys: ParamKey[],
    readonly stack: Handler[]
  ) { }

  params(route: string[]): Params {
    const params: Params = Object.create(null)
    for (const [name, index, rest] of this.keys) {
      params[name] = rest ? route.slice(index).join('/') : route[index]
    }
    return params
  }

}

export class Node {

  endpoint: Endpoint | null = null
  dynamicChild: Node | null = null
  catchAllChild: Node | null = null
  staticChildren: Record<string, Node> | null = null

  constructor(public token: string) { }

}

type Prepared = {
  method: string
  path: string
  keys: ParamKey[]
  tokens: string[]
  route: string
}

type Route<R extends Router = Router> = <P extends Params = Params>(
  path: string,
  ...handlers: RequestHandlers<P>
) => R

function decodeSegments(pathname: string): string[] {
  return pathname.split('/').filter(Boolean).map(segment => {
    try {
      return decodeURIComponent(segment)
    } catch (err) {
      throw new HttpError(StatusCodes.BAD_REQUEST, `malformed path segment ${segment}`, { cause: err })
    }
  })
}

export class Router extends Function {

  protected _routes: Record<string, string> = Object.create(null)
  protected _methods: Record<string, Node> = Object.create(null)
  protected _endpoints: Endpoint[] = []
  protected _middleware: Middleware[] = []
  protected _frozen = false
  protected _caseSensitive: boolean
  protected _logger: Logger
  protected _notFound: NotFoundHandler = () => json({ error: 'Not Found' }, { status: StatusCodes.NOT_FOUND })
  protected _onError: ErrorHandler | null = null

  constructor(options: RouterOptions = {}) {
    super()
    this._caseSensitive = options.caseSensitive ?? false
    this._logger = options.logger ?? getLogger('router')
  }

  on<P extends Params = Params>(
    method: string,
    path: string,
    ...handlers: RequestHandlers<P>
  ): this {
    const stack: Handler<P>[] = []
    for (const handler of handlers) {
      if (Array.isArray(handler)) stack.push(...handler)
      else stack.push(handler)
    }
    return this._add(method.toUpperCase(), path, stack, [])
  }

  protected _add(method: string, path: string, handlers: Handler[], scope: Middleware[]): this {
    if (this._frozen) throw new FrozenRouterError('register', `${method} ${path}`)
    return this._insert(this._prepare(method, path), [...scope, ...handlers])
  }

  protected _prepare(method: string, path: string, taken: Record<string, string> = this._routes): Prepared {

    const { segments, keys } = parsePattern(path)
    const tokens = tokenize(segments, this._caseSensitive)
    const route = [method, ...tokens].join('/')

    if (taken[route] != null) {
      throw new ConflictError(`${method} route conflict: ${path} - ${taken[route]}`)
    }

    return { method, path, keys, tokens, route }
  }

  protected _insert({ method, path, keys, tokens, route }: Prepared, stack: Handler[]): this {

    this._routes[route] = path

    let node: Node = this._methods[method] ??= new Node('/')

    for (const token of tokens) {
      if (token === ':') {
        node = node.dynamicChild ??= new Node(token)
      } else if (token === '*') {
        node = node.catchAllChild ??= new Node(token)
      } else {
        const children: Record<string, Node> = node.staticChildren ??= Object.create(null)
        node = children[token] ??= new Node(token)
      }
    }

    const endpoint = new Endpoint(method, path, keys, stack)
    node.endpoint = endpoint
    this._endpoints.push(endpoint)

    return this
  }

  /**
   * Appends router-wide middleware. It wraps every route of this router,
   * including routes of mounted routers, in the order it was added.
   */
  use(prefix: string, router: Router): this
  use(...middleware: [Middleware, ...Middleware[]]): this
  use(first: string | Middleware, ...rest: Array<Router | Middleware>): this {
    if (typeof first === 'string') {
      const [router] = rest
      if (!(router instanceof Router)) throw new TypeError(`use(${first}) expects a router to mount`)
      return this.mount(first, router)
    }
    if (this._frozen) throw new FrozenRouterError('add middleware to', 'router')
    const middleware: Middleware[] = [first]
    for (const layer of rest) {
      if (layer instanceof Router) throw new TypeError('routers are mounted with use(prefix, router)')
      middleware.push(layer)
    }
    this._middleware.push(...middleware)
    return this
  }

  /**
   * Copies every route of `router` under `prefix`. The mounted router's own
   * middleware runs after this router's middleware and only for its routes.
   * The mounted router is frozen: routes added to it later would not be seen.
   * Nothing is registered unless every combined pattern is valid.
   */
  mount(prefix: string, router: Router): this {
    if (router === this) throw new ConflictError('a router cannot be mounted on itself')
    if (this._frozen) throw new FrozenRouterError('mount', prefix)
    const taken: Record<string, string> = Object.create(null)
    Object.assign(taken, this._routes)
    const routes = router._endpoints.map(endpoint => {
      const route = this._prepare(endpoint.method, joinPaths(prefix, endpoint.pattern), taken)
      taken[route.route] = route.path
      return { route, stack: [...router._middleware, ...endpoint.stack] }
    })
    router.freeze()
    for (const { route, stack } of routes) this._insert(route, stack)
    return this
  }

  notFound(handler: NotFoundHandler): this {
    if (this._frozen) throw new FrozenRouterError('set the not found handler of', 'router')
    this._notFound = handler
    return this
  }

  onError(handler: ErrorHandler): this {
    if (this._frozen) throw new FrozenRouterError('set the error handler of', 'router')
    this._onError = handler
    return this
  }

  freeze(): this {
    this._frozen = true
    return this
  }

  get frozen(): boolean {
    return this._frozen
  }

  match(method: string, path: string): MatchResult | null {
    const root = this._methods[method.toUpperCase()]
    if (root == null) return null
    const route = decodeSegments(path.split('?')[0])
    const endpoint = this._find(root, route)
    if (endpoint == null) return null
    return {
      method: endpoint.method,
      pattern: endpoint.pattern,
      params: endpoint.params(route),
      stack: endpoint.stack
    }
  }

  /**
   * Depth-first search that pops static children before dynamic ones and
   * dynamic ones before catch-alls, backtracking when a branch dead-ends.
   */
  protected _find(root: Node, route: string[]): Endpoint | null {

    const stack: [Node, number][] = [[root, 0]]

    for (let top = stack.pop(); top != null; top = stack.pop()) {
      const [node, depth] = top
      if (node.token === '*') return node.endpoint
      if (depth === route.length) {
        if (node.endpoint != null) return node.endpoint
        continue
      }
      const next = depth + 1
      if (node.catchAllChild != null) stack.push([node.catchAllChild, route.length])
      if (node.dynamicChild != null) stack.push([node.dynamicChild, next])
      const slug = this._caseSensitive ? route[depth] : route[depth].toLowerCase()
      const child = node.staticChildren?.[slug]
      if (child != null) stack.push([child, next])
    }

    return null
  }

  get: Route<this> = (path, ...handlers) => this.on('GET', path, ...handlers)
  put: Route<this> = (path, ...handlers) => this.on('PUT', path, ...handlers)
  post: Route<this> = (path, ...handlers) => this.on('POST', path, ...handlers)
  head: Route<this> = (path, ...handlers) => this.on('HEAD', path, ...handlers)
  patch: Route<this> = (path, ...handlers) => this.on('PATCH', path, ...handlers)
  delete: Route<this> = (path, ...handlers) => this.on('DELETE', path, ...handlers)
  options: Route<this> = (path, ...handlers) => this.on('OPTIONS', path, ...handlers)

  all: Route<this> = (path, ...handlers) => {
    for (const method of METHODS) this.on(method, path, ...handlers)
    return this
  }

  fetch = async (req: Request): Promise<Response> => {

    this.freeze()

    const url = new URL(req.url)

    let match: MatchResult | null = null
    let headless = false
    try {
      match = this.match(req.method, url.pathname)
      if (match == null && req.method === 'HEAD') {
        match = this.match('GET', url.pathname)
        headless = true
      }
    } catch (err) {
      return await this._fail(err, req)
    }

    if (match == null) {
      try {
        return await this._notFound(req, url)
      } catch (err) {
        return await this._fail(err, req)
      }
    }

    const controller = new AbortController()
    const onAbort = () => controller.abort(new RequestAbortedError())

    if (req.signal.aborted) onAbort()
    else req.signal.addEventListener('abort', onAbort, { once: true })

    const dispatch = compose([...this._middleware, ...match.stack], err => {
      this._logger.warn({ err, method: req.method, url: req.url }, 'abandoned chain rejected')
    })

    try {
      const res = await dispatch({
        req,
        url,
        params: match.params,
        pattern: match.pattern,
        state: Object.create(null),
        signal: controller.signal,
        abort: reason => controller.abort(reason)
      })
      return headless ? new Response(null, res) : res
    } catch (err) {
      return await this._fail(err, req)
    } finally {
      req.signal.removeEventListener('abort', onAbort)
    }
  }

  protected async _fail(err: unknown, req: Request): Promise<Response> {
    if (this._onError != null) {
      try {
        return await this._onError(err, req)
      } catch (failure) {
        this._logger.error({ err: failure, method: req.method, url: req.url }, 'error handler threw')
      }
    }
    return this._respondToError(err, req)
  }

  protected _respondToError(err: unknown, req: Request): Response {
    const meta = { err, method: req.method, url: req.url }
    if (isHttpError(err)) {
      if (err.status >= StatusCodes.INTERNAL_SERVER_ERROR) this._logger.error(meta, err.message)
      return fromError(err)
    }
    if (err instanceof MiddlewareFault) {
      this._logger.error(meta, 'middleware fault')
    } else {
      this._logger.error(meta, 'unhandled error')
    }
    return fromError(new HttpError(StatusCodes.INTERNAL_SERVER_ERROR))
  }

}
