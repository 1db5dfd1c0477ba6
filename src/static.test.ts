import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { expect } from 'chai'
import pino from 'pino'
import { Router } from './router'
import { contentType, serveStatic } from './static'

const logger = pino({ level: 'silent' })

const get = (path: string, init?: RequestInit) => new Request(`http://localhost${path}`, init)

describe('serveStatic(options)', () => {

  let dir: string
  let router: Router

  before('write the fixture files', async () => {
    dir = await mkdtemp(join(tmpdir(), 'waymark-static-'))
    await mkdir(join(dir, 'public', 'docs'), { recursive: true })
    await mkdir(join(dir, 'public', 'empty'))
    await writeFile(join(dir, 'public', 'hello.txt'), 'hello')
    await writeFile(join(dir, 'public', 'docs', 'index.html'), '<h1>docs</h1>')
    await writeFile(join(dir, 'secret.txt'), 'do not serve')
  })

  after('remove the fixture files', () => rm(dir, { recursive: true, force: true }))

  beforeEach('instantiate a new router', () => {
    router = new Router({ logger }).get('/static/*', serveStatic({ root: join(dir, 'public') }))
  })

  it('serves a file with its content type and cache header', async () => {
    const res = await router.fetch(get('/static/hello.txt'))
    expect(res).to.have.property('status', 200)
    expect(res.headers.get('content-type')).to.equal('text/plain; charset=utf-8')
    expect(res.headers.get('cache-control')).to.equal('max-age=3600')
    expect(await res.text()).to.equal('hello')
  })

  it('serves the index file of a directory', async () => {
    const res = await router.fetch(get('/static/docs'))
    expect(res.headers.get('content-type')).to.equal('text/html; charset=utf-8')
    expect(await res.text()).to.equal('<h1>docs</h1>')
  })

  it('answers 404 for a missing file', async () => {
    const res = await router.fetch(get('/static/missing.txt'))
    expect(res).to.have.property('status', 404)
    expect(await res.json()).to.deep.equal({ error: 'File not found' })
  })

  it('answers 404 for a directory without an index file', async () => {
    const res = await router.fetch(get('/static/empty'))
    expect(res).to.have.property('status', 404)
  })

  it('refuses paths that leave the root', async () => {
    const res = await router.fetch(get('/static/..%2Fsecret.txt'))
    expect(res).to.have.property('status', 403)
    expect(await res.json()).to.deep.equal({ error: 'Access denied' })
  })

  it('answers 304 when the etag still matches', async () => {
    const first = await router.fetch(get('/static/hello.txt'))
    const etag = first.headers.get('etag') ?? ''
    expect(etag).to.match(/^"[0-9a-z]+-[0-9a-z]+"$/)
    const res = await router.fetch(get('/static/hello.txt', { headers: { 'if-none-match': etag } }))
    expect(res).to.have.property('status', 304)
    expect(res.headers.get('etag')).to.equal(etag)
  })

  it('takes the max-age and parameter name from its options', async () => {
    router = new Router({ logger })
      .get('/files/*path', serveStatic({ root: join(dir, 'public'), maxAge: 0, param: 'path' }))
    const res = await router.fetch(get('/files/hello.txt'))
    expect(res.headers.get('cache-control')).to.equal('max-age=0')
    expect(await res.text()).to.equal('hello')
  })

  it('falls back to application/octet-stream', async () => {
    expect(contentType('data.bin')).to.equal('application/octet-stream')
    expect(contentType('PHOTO.JPG')).to.equal('image/jpeg')
  })

})
