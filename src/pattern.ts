import { ConflictError, PatternError } from './errors'

export type Segment =
  | { type: 'static', value: string }
  | { type: 'param', name: string }
  | { type: 'wildcard', name: string }

export type ParamKey = [name: string, index: number, rest: boolean]

export type Pattern = {
  path: string
  segments: Segment[]
  keys: ParamKey[]
}

const PARAM_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/

/**
 * Parses a route pattern made of `/static`, `/:param` and an optional final
 * `/*` or `/*name` catch-all. A bare `*` is exposed under the `*` key.
 */
export function parsePattern(path: string): Pattern {

  if (!path.startsWith('/')) {
    throw new PatternError(`invalid route ${path} - must start with /`)
  }

  const slugs = path.split('/').filter(Boolean)
  const segments: Segment[] = []
  const keys: ParamKey[] = []

  for (let index = 0; index < slugs.length; index++) {
    const slug = slugs[index]
    if (slug.startsWith('*')) {
      if (index !== slugs.length - 1) {
        throw new PatternError(`invalid route ${path} - catch-all is only allowed at the end`)
      }
      const name = slug === '*' ? '*' : slug.slice(1)
      if (name !== '*' && !PARAM_NAME.test(name)) {
        throw new PatternError(`invalid route ${path} - bad catch-all name ${slug}`)
      }
      segments.push({ type: 'wildcard', name })
      keys.push([name, index, true])
    } else if (slug.startsWith(':')) {
      const name = slug.slice(1)
      if (!PARAM_NAME.test(name)) {
        throw new PatternError(`invalid route ${path} - bad parameter name ${slug}`)
      }
      segments.push({ type: 'param', name })
      keys.push([name, index, false])
    } else {
      segments.push({ type: 'static', value: slug })
    }
  }

  const seen = new Set<string>()
  for (const [name] of keys) {
    if (seen.has(name)) {
      throw new ConflictError(`route ${path} repeats parameter ${name}`)
    }
    seen.add(name)
  }

  return { path, segments, keys }
}

export function joinPaths(prefix: string, path: string): string {
  const head = prefix.replace(/\/+$/, '')
  if (path === '/' || path === '') return head === '' ? '/' : head
  return head + (path.startsWith('/') ? path : `/${path}`)
}

/**
 * The structural shape of a pattern: parameter names are erased so that
 * `/users/:id` and `/users/:userId` collide.
 */
export function tokenize(segments: Segment[], caseSensitive: boolean): string[] {
  return segments.map(segment => {
    switch (segment.type) {
      case 'param': return ':'
      case 'wildcard': return '*'
      case 'static': return caseSensitive ? segment.value : segment.value.toLowerCase()
    }
  })
}
