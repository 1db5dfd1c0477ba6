export type Params = Record<string, string>

export type State = Record<string, unknown>

export type NextHandler = () => Promise<Response>

export type Scope<P extends Params = Params> = {
  req: Request
  url: URL
  params: P
  /** The registered pattern that matched, mount prefixes included. */
  pattern: string
  state: State
  signal: AbortSignal
  abort: (reason?: unknown) => void
}

export type Context<P extends Params = Params> = Scope<P> & {
  next: NextHandler
}

// Declared as a method so that a handler typed for narrower params can sit in
// a stack typed for `Params`.
export type Handler<P extends Params = Params> = {
  handle(ctx: Context<P>): Response | Promise<Response>
}['handle']

export type Middleware = Handler

export type RequestHandlers<P extends Params = Params> =
  | [Handler<P>, ...Handler<P>[]]
  | [[Handler<P>, ...Handler<P>[]]]

export type NotFoundHandler = (req: Request, url: URL) => Response | Promise<Response>

export type ErrorHandler = (err: unknown, req: Request) => Response | Promise<Response>

export type MatchResult = {
  method: string
  pattern: string
  params: Params
  /** Mounted routers' middleware followed by the route's own handlers. */
  stack: Handler[]
}
