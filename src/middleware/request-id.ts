import { randomUUID } from 'crypto'
import { withHeaders } from '../response'
import type { Middleware } from '../types'

export type RequestIdOptions = {
  header?: string
  generate?: () => string
  /** Reuse an id sent by the client. */
  trustHeader?: boolean
}

export function requestId(options: RequestIdOptions = {}): Middleware {

  const header = (options.header ?? 'x-request-id').toLowerCase()
  const generate = options.generate ?? randomUUID
  const trustHeader = options.trustHeader !== false

  return async function tagRequest({ req, state, next }) {
    const inbound = trustHeader ? req.headers.get(header) : null
    const id = inbound != null && inbound !== '' ? inbound : generate()
    state.requestId = id
    return withHeaders(await next(), { [header]: id })
  }

}
