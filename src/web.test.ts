import { expect } from 'chai'
import pino from 'pino'
import { ConflictError } from './errors'
import { json } from './response'
import waymark from './web'

const get = (path: string) => new Request(`http://localhost${path}`)

describe('web', () => {

  let app: ReturnType<typeof waymark>

  beforeEach('instantiate a new app', () => (app = waymark({ logger: pino({ level: 'silent' }) })))

  it('registers routes through the app', () => {
    app.get('/api/foo', () => json(null))
    expect(() => {
      app.get('/api/foo', () => json(null))
    }).to.throw(ConflictError, 'GET route conflict: /api/foo - /api/foo')
  })

  it('can be called as a fetch handler', async () => {
    app.get<{ id: string }>('/users/:id', ({ params }) => json({ id: params.id }))
    const res = await app(get('/users/42'))
    expect(res).to.have.property('status', 200)
    expect(await res.json()).to.deep.equal({ id: '42' })
  })

  it('returns a 404 response when no route is matched', async () => {
    app.get('/foo', () => json(null))
    const res = await app(get('/bar'))
    expect(res).to.have.property('status', 404)
  })

  it('runs middleware around the handler', async () => {
    const log: string[] = []
    app
      .use(async ({ next }) => {
        log.push('A-before')
        const res = await next()
        log.push('A-after')
        return res
      })
      .use(async ({ next }) => {
        log.push('B-before')
        const res = await next()
        log.push('B-after')
        return res
      })
      .get('/', () => {
        log.push('H')
        return json('done')
      })
    await app(get('/'))
    expect(log).to.deep.equal(['A-before', 'B-before', 'H', 'B-after', 'A-after'])
  })

  it('passes the fetch method around unbound', async () => {
    app.get('/', () => json('bound'))
    const { fetch } = app
    const res = await fetch(get('/'))
    expect(await res.json()).to.equal('bound')
  })

})
