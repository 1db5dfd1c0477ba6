import { withHeaders } from '../response'
import type { Middleware } from '../types'

export function responseTime(header = 'x-response-time'): Middleware {
  return async function stopwatch({ next }) {
    const start = performance.now()
    const res = await next()
    return withHeaders(res, { [header]: `${Math.round(performance.now() - start)}ms` })
  }
}
