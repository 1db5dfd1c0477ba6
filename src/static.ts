import { readFile, stat } from 'fs/promises'
import { extname, join, resolve, sep } from 'path'
import { StatusCodes } from 'http-status-codes'
import { HttpError } from './errors'
import mimeTypes from './mime-types.json'
import type { Handler } from './types'

const MIME_TYPES: Record<string, string | undefined> = mimeTypes

export type StaticOptions = {
  root: string
  /** File served for a directory. Defaults to `index.html`. */
  index?: string
  /** `cache-control` max-age in seconds. Defaults to one hour. */
  maxAge?: number
  /** Route parameter holding the file path. Defaults to the bare catch-all `*`. */
  param?: string
}

export const contentType = (file: string) =>
  MIME_TYPES[extname(file).slice(1).toLowerCase()] ?? 'application/octet-stream'

async function lookup(file: string) {
  try {
    return await stat(file)
  } catch (err) {
    if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) return null
    throw err
  }
}

/**
 * A GET handler serving files below `root`, for a route such as
 * `/assets/*`. Paths that resolve outside of `root` get a 403.
 */
export function serveStatic(options: StaticOptions): Handler {

  const { index = 'index.html', maxAge = 3600, param = '*' } = options
  const root = resolve(options.root)

  return async function sendFile({ req, params }) {

    let file = resolve(root, params[param] ?? '')
    if (file !== root && !file.startsWith(root + sep)) throw HttpError.forbidden('Access denied')

    let stats = await lookup(file)
    if (stats?.isDirectory() === true) {
      file = join(file, index)
      stats = await lookup(file)
    }
    if (stats == null || !stats.isFile()) throw HttpError.notFound('File not found')

    const etag = `"${stats.size.toString(36)}-${Math.floor(stats.mtimeMs).toString(36)}"`
    const headers = {
      'cache-control': `max-age=${maxAge}`,
      'last-modified': stats.mtime.toUTCString(),
      etag
    }

    if (req.headers.get('if-none-match') === etag) {
      return new Response(null, { status: StatusCodes.NOT_MODIFIED, headers })
    }

    const data = await readFile(file)
    const body = new ArrayBuffer(data.byteLength)
    new Uint8Array(body).set(data)

    return new Response(body, { headers: { ...headers, 'content-type': contentType(file) } })
  }

}
