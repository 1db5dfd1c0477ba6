import { withHeaders } from '../response'
import type { Middleware } from '../types'

export const SECURITY_HEADERS: Readonly<Record<string, string>> = {
  'x-content-type-options': 'nosniff',
  'x-frame-options': 'DENY',
  'x-xss-protection': '1; mode=block',
  'strict-transport-security': 'max-age=31536000; includeSubDomains',
  'content-security-policy': "default-src 'self'",
  'x-permitted-cross-domain-policies': 'none',
  'referrer-policy': 'strict-origin-when-cross-origin'
}

/**
 * Adds `SECURITY_HEADERS` to every response. `overrides` replaces single
 * headers; a `false` value leaves that header out.
 */
export function helmet(overrides: Record<string, string | false> = {}): Middleware {

  const headers = new Headers()
  for (const [name, value] of Object.entries({ ...SECURITY_HEADERS, ...overrides })) {
    if (value !== false) headers.set(name, value)
  }

  return async function secure({ next }) {
    return withHeaders(await next(), headers)
  }

}
