import type { Logger } from 'pino'
import { getLogger } from '../logger'
import type { Middleware } from '../types'

export type LoggerOptions = {
  logger?: Logger
}

/**
 * One access line per request, written after the inner chain settles.
 */
export function logger(options: LoggerOptions = {}): Middleware {

  const log = options.logger ?? getLogger('http')

  return async function accessLog({ req, url, next }) {
    const start = performance.now()
    const fields = () => ({
      method: req.method,
      path: url.pathname,
      duration: Math.round(performance.now() - start)
    })
    try {
      const res = await next()
      log.info({ ...fields(), status: res.status }, `${req.method} ${url.pathname} ${res.status}`)
      return res
    } catch (err) {
      log.warn({ ...fields(), err }, `${req.method} ${url.pathname} failed`)
      throw err
    }
  }

}
