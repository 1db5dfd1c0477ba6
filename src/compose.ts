import { StatusCodes } from 'http-status-codes'
import { MiddlewareFault } from './errors'
import type { Handler, Params, Scope } from './types'

const label = (layer: Handler, depth: number) =>
  `${layer.name === '' ? 'anonymous handler' : layer.name} at position ${depth}`

/**
 * Folds a handler stack into one function. Each layer gets its own `next`;
 * code before `await next()` runs outer to inner and code after it runs inner
 * to outer. A stack whose last layer still calls `next()` ends in a 501.
 *
 * A layer that settles while the chain it started through `next()` is still
 * running faults and aborts the scope. Whatever that abandoned chain rejects
 * with later goes to `onStray`.
 */
export function compose<P extends Params = Params>(
  stack: Handler<P>[],
  onStray: (err: unknown) => void = () => {}
) {

  return (scope: Scope<P>): Promise<Response> => {

    return (async function _next(depth: number): Promise<Response> {

      scope.signal.throwIfAborted()

      if (depth === stack.length) return new Response(null, { status: StatusCodes.NOT_IMPLEMENTED })

      const layer = stack[depth]
      const running = new Set<Promise<Response>>()
      let called = false
      let settled = false

      const next = () => {
        if (settled) {
          return Promise.reject(new MiddlewareFault(`${label(layer, depth)} called next() after it settled`))
        }
        if (called) {
          return Promise.reject(new MiddlewareFault(`${label(layer, depth)} called next() more than once`))
        }
        called = true
        const inner = _next(depth + 1)
        const done = () => void running.delete(inner)
        running.add(inner)
        inner.then(done, done)
        return inner
      }

      const abandon = (): MiddlewareFault | null => {
        settled = true
        if (running.size === 0) return null
        for (const inner of running) inner.catch(onStray)
        if (scope.signal.aborted) return null
        const fault = new MiddlewareFault(`${label(layer, depth)} settled before the next() it called`)
        scope.abort(fault)
        return fault
      }

      let res: unknown
      try {
        res = await layer({ ...scope, next })
      } catch (err) {
        abandon()
        throw err
      }

      const fault = abandon()
      if (fault != null) throw fault

      if (!(res instanceof Response)) {
        throw new MiddlewareFault(
          `${label(layer, depth)} resolved to ${res === null ? 'null' : typeof res} instead of a Response`
        )
      }

      return res
    })(0)
  }

}
