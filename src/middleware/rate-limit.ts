import { StatusCodes } from 'http-status-codes'
import type { Logger } from 'pino'
import { getLogger } from '../logger'
import { remoteAddress } from '../node'
import { json, withHeaders } from '../response'
import type { Middleware } from '../types'

export type RateLimitOptions = {
  /** Requests allowed per window and key. */
  max?: number
  windowMs?: number
  message?: string
  /** Path prefixes that are never counted. */
  skip?: string[]
  /** Requests for which this returns `undefined` are not counted. */
  key?: (req: Request) => string | undefined
  now?: () => number
  logger?: Logger
}

type Window = {
  count: number
  start: number
}

/**
 * Fixed-window counter per key. Counters live in this middleware instance only.
 *
 * The default key is the client address the Node adapter saw. Requests that
 * reach the router some other way (`createApp`, a direct `fetch`) carry no
 * address and pass uncounted, with a warning logged once; give those apps a
 * `key` of their own.
 */
export function rateLimit(options: RateLimitOptions = {}): Middleware {

  const {
    max = 100,
    windowMs = 60_000,
    message = 'Too many requests. Please try again later.',
    skip = [],
    key = remoteAddress,
    now = Date.now
  } = options

  const log = options.logger ?? getLogger('rate-limit')
  let warned = false

  const windows = new Map<string, Window>()
  let sweptAt = now()

  const sweep = (time: number) => {
    if (time - sweptAt < windowMs) return
    for (const [id, window] of windows) {
      if (time - window.start >= windowMs) windows.delete(id)
    }
    sweptAt = time
  }

  return async function throttle({ req, url, next }) {

    if (skip.some(prefix => url.pathname.startsWith(prefix))) return await next()

    const id = key(req)
    if (id === undefined) {
      if (!warned) log.warn({ path: url.pathname }, 'request has no rate limit key and is not counted')
      warned = true
      return await next()
    }

    const time = now()
    sweep(time)

    let window = windows.get(id)
    if (window == null || time - window.start >= windowMs) {
      window = { count: 0, start: time }
      windows.set(id, window)
    }
    window.count += 1

    if (window.count > max) {
      const retryAfter = Math.max(1, Math.ceil((window.start + windowMs - time) / 1000))
      return json({ error: 'Too Many Requests', message, retryAfter }, {
        status: StatusCodes.TOO_MANY_REQUESTS,
        headers: {
          'x-ratelimit-limit': String(max),
          'x-ratelimit-remaining': '0',
          'retry-after': String(retryAfter)
        }
      })
    }

    return withHeaders(await next(), {
      'x-ratelimit-limit': String(max),
      'x-ratelimit-remaining': String(max - window.count)
    })
  }

}
