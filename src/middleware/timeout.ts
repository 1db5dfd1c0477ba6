import { RequestTimeoutError } from '../errors'
import { fromError } from '../response'
import type { Middleware } from '../types'

/**
 * Races the rest of the chain against a deadline. When the deadline wins the
 * request signal is aborted, so inner layers stop at their next `next()` and
 * handlers watching `signal` can let go of what they hold.
 */
export function timeout(ms: number): Middleware {

  return async function deadline({ next, abort }) {
    let timer: NodeJS.Timeout | undefined
    const expired = new Promise<Response>(resolve => {
      timer = setTimeout(() => {
        const err = new RequestTimeoutError(ms)
        abort(err)
        resolve(fromError(err))
      }, ms)
    })
    try {
      return await Promise.race([next(), expired])
    } finally {
      clearTimeout(timer)
    }
  }

}
