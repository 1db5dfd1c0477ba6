import { StatusCodes } from 'http-status-codes'
import { METHODS } from '../router'
import { empty, withHeaders } from '../response'
import type { Middleware } from '../types'

type OriginMatcher = string | RegExp

export type CorsOptions = {
  origin?: '*' | OriginMatcher | OriginMatcher[] | ((origin: string) => boolean | Promise<boolean>)
  methods?: string[]
  allowedHeaders?: string[]
  exposedHeaders?: string[]
  credentials?: boolean
  /** Seconds a preflight answer may be cached. */
  maxAge?: number
}

async function isOriginAllowed(origin: string, allowed: NonNullable<CorsOptions['origin']>): Promise<boolean> {
  if (allowed === '*') return true
  if (allowed instanceof RegExp) return allowed.test(origin)
  if (Array.isArray(allowed)) {
    return allowed.some(entry => typeof entry === 'string' ? entry === origin : entry.test(origin))
  }
  if (typeof allowed === 'function') return await allowed(origin)
  return allowed === origin
}

function mergeVary(prev: string | null, name: string): string {
  if (prev == null || prev.trim() === '') return name
  if (prev.trim() === '*') return prev
  const parts = prev.split(',').map(part => part.trim())
  if (!parts.some(part => part.toLowerCase() === name.toLowerCase())) parts.push(name)
  return parts.join(', ')
}

/**
 * Answers preflight requests with 204 and adds `access-control-*` headers to
 * every other response from an allowed origin. Preflights only get here when
 * an `OPTIONS` route matches, e.g. `router.options('/*', ...)`.
 */
export function cors(options: CorsOptions = {}): Middleware {

  const {
    origin = '*',
    methods = METHODS.filter(method => method !== 'OPTIONS'),
    allowedHeaders = ['Content-Type', 'Authorization'],
    exposedHeaders = [],
    credentials = false,
    maxAge = 86400
  } = options

  const wildcard = origin === '*' && !credentials

  return async function crossOrigin({ req, next }) {

    const requestOrigin = req.headers.get('origin')

    if (requestOrigin == null || !await isOriginAllowed(requestOrigin, origin)) {
      return await next()
    }

    const headers = new Headers({
      'access-control-allow-origin': wildcard ? '*' : requestOrigin
    })

    if (credentials) headers.set('access-control-allow-credentials', 'true')

    const isPreflight = req.method === 'OPTIONS' && req.headers.has('access-control-request-method')

    if (isPreflight) {
      headers.set('access-control-allow-methods', methods.join(', '))
      headers.set('access-control-allow-headers', allowedHeaders.join(', '))
      headers.set('access-control-max-age', String(maxAge))
      if (!wildcard) headers.set('vary', 'Origin')
      return empty(StatusCodes.NO_CONTENT, { headers })
    }

    if (exposedHeaders.length !== 0) {
      headers.set('access-control-expose-headers', exposedHeaders.join(', '))
    }

    const res = withHeaders(await next(), headers)
    if (!wildcard) res.headers.set('vary', mergeVary(res.headers.get('vary'), 'Origin'))
    return res
  }

}
