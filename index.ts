export { Router, METHODS } from './src/router'
export { compose } from './src/compose'
export { parsePattern, joinPaths } from './src/pattern'
export {
  ConflictError,
  FrozenRouterError,
  HttpError,
  MiddlewareFault,
  PatternError,
  RequestAbortedError,
  RequestTimeoutError,
  isHttpError,
  reasonOf
} from './src/errors'
export {
  json,
  text,
  html,
  empty,
  redirect,
  withHeaders,
  fromError,
  cookie,
  clearCookie,
  serializeCookie,
  type CookieOptions,
  type JSONValue
} from './src/response'
export { serveStatic, contentType, type StaticOptions } from './src/static'
export { getLogger } from './src/logger'
export { readEnvironment, type RouterOptions, type NodeAdapterOptions } from './src/config'
export { default as createApp, type App } from './src/web'
export { default as createNodeApp, listen, close, remoteAddress, type NodeApp } from './src/node'
export * from './src/middleware'
export type {
  Context,
  ErrorHandler,
  Handler,
  MatchResult,
  Middleware,
  NextHandler,
  NotFoundHandler,
  Params,
  RequestHandlers,
  Scope,
  State
} from './src/types'
