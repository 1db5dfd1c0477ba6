import type { RouterOptions } from './config'
import { Router } from './router'

export type App = Router & ((req: Request) => Promise<Response>)

/**
 * A router that can be called directly as a `fetch`-style handler.
 */
export default function waymark(options: RouterOptions = {}): App {

  const router = new Router(options)

  return new Proxy(router, {
    apply(_, __, [req]: [Request]) {
      return router.fetch(req)
    }
  }) as App

}
