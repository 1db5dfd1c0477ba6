import { StatusCodes } from 'http-status-codes'
import { HttpError } from './errors'

export type JSONValue =
  | number
  | boolean
  | string
  | null
  | Array<JSONValue>
  | { [key: string]: JSONValue }
  | { toJSON(): JSONValue }

export function json(data: JSONValue, init: ResponseInit = {}): Response {
  const headers = new Headers(init.headers)
  if (!headers.has('content-type')) {
    headers.set('content-type', 'application/json; charset=UTF-8')
  }
  return new Response(JSON.stringify(data), { ...init, headers })
}

export function text(body: string, init: ResponseInit = {}): Response {
  const headers = new Headers(init.headers)
  if (!headers.has('content-type')) {
    headers.set('content-type', 'text/plain; charset=UTF-8')
  }
  return new Response(body, { ...init, headers })
}

export function html(body: string, init: ResponseInit = {}): Response {
  const headers = new Headers(init.headers)
  headers.set('content-type', 'text/html; charset=UTF-8')
  return new Response(body, { ...init, headers })
}

export const empty = (status: number = StatusCodes.NO_CONTENT, init: ResponseInit = {}) =>
  new Response(null, { ...init, status })

/**
 * Unlike `Response.redirect()`, the returned response keeps mutable headers so
 * middleware further out can still decorate it.
 */
export function redirect(location: string | URL, status: number = StatusCodes.MOVED_TEMPORARILY): Response {
  return new Response(null, { status, headers: { location: String(location) } })
}

/**
 * Copies `res` with `headers` merged over its own. The body stream is moved,
 * not cloned, so `res` must not be read afterwards.
 */
export function withHeaders(res: Response, headers: HeadersInit): Response {
  const copy = new Response(res.body, res)
  new Headers(headers).forEach((value, name) => copy.headers.set(name, value))
  return copy
}

export function fromError(err: HttpError): Response {
  const message = err.expose ? err.message : new HttpError(err.status).message
  return json({ error: message }, { status: err.status, headers: err.headers })
}

export type CookieOptions = {
  /** Seconds until the cookie expires. */
  maxAge?: number
  expires?: Date
  path?: string
  domain?: string
  secure?: boolean
  httpOnly?: boolean
  sameSite?: 'Strict' | 'Lax' | 'None'
}

const COOKIE_NAME = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/

export function serializeCookie(name: string, value: string, options: CookieOptions = {}): string {
  if (!COOKIE_NAME.test(name)) throw new TypeError(`invalid cookie name ${name}`)
  const parts = [`${name}=${encodeURIComponent(value)}`]
  if (options.maxAge != null) parts.push(`Max-Age=${Math.floor(options.maxAge)}`)
  if (options.expires != null) parts.push(`Expires=${options.expires.toUTCString()}`)
  if (options.path != null) parts.push(`Path=${options.path}`)
  if (options.domain != null) parts.push(`Domain=${options.domain}`)
  if (options.secure === true) parts.push('Secure')
  if (options.httpOnly === true) parts.push('HttpOnly')
  if (options.sameSite != null) parts.push(`SameSite=${options.sameSite}`)
  return parts.join('; ')
}

/**
 * Copies `res` with one more `set-cookie` header. Earlier cookies are kept.
 * Like `withHeaders`, the body is moved to the copy.
 */
export function cookie(res: Response, name: string, value: string, options: CookieOptions = {}): Response {
  const copy = new Response(res.body, res)
  copy.headers.append('set-cookie', serializeCookie(name, value, options))
  return copy
}

export function clearCookie(res: Response, name: string, options: Pick<CookieOptions, 'path' | 'domain'> = {}): Response {
  return cookie(res, name, '', { ...options, maxAge: 0, expires: new Date(0) })
}
