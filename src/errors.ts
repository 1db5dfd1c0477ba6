import { StatusCodes, getReasonPhrase } from 'http-status-codes'

export class PatternError extends Error {

  name = 'PatternError'

}

export class ConflictError extends Error {

  name = 'ConflictError'

}

export class FrozenRouterError extends Error {

  name = 'FrozenRouterError'

  constructor(method: string, target: string) {
    super(`cannot ${method} ${target} - router is already serving requests`)
  }

}

/**
 * A middleware or handler broke the chain contract: it resolved to something
 * other than a Response, or it called `next()` more than once.
 */
export class MiddlewareFault extends Error {

  name = 'MiddlewareFault'

}

export function reasonOf(status: number): string {
  try {
    return getReasonPhrase(status)
  } catch {
    return status < 500 ? 'Client Error' : 'Server Error'
  }
}

type HttpErrorOptions = {
  cause?: unknown
  expose?: boolean
  headers?: HeadersInit
}

export class HttpError extends Error {

  name = 'HttpError'

  status: number
  expose: boolean
  headers: HeadersInit | undefined

  constructor(status: number, message?: string, options: HttpErrorOptions = {}) {
    super(message ?? reasonOf(status), { cause: options.cause })
    this.status = status
    this.expose = options.expose ?? status < 500
    this.headers = options.headers
  }

  static badRequest = (message?: string) => new HttpError(StatusCodes.BAD_REQUEST, message)
  static unauthorized = (message?: string) => new HttpError(StatusCodes.UNAUTHORIZED, message)
  static forbidden = (message?: string) => new HttpError(StatusCodes.FORBIDDEN, message)
  static notFound = (message?: string) => new HttpError(StatusCodes.NOT_FOUND, message)

}

export const CLIENT_CLOSED_REQUEST = 499

export class RequestAbortedError extends HttpError {

  name = 'RequestAbortedError'

  constructor() {
    super(CLIENT_CLOSED_REQUEST, 'Client Closed Request')
  }

}

export class RequestTimeoutError extends HttpError {

  name = 'RequestTimeoutError'

  constructor(ms: number) {
    super(StatusCodes.REQUEST_TIMEOUT, 'Request Timeout', { cause: `exceeded ${ms}ms` })
  }

}

export const isHttpError = (err: unknown): err is HttpError => err instanceof HttpError
