import { expect } from 'chai'
import pino from 'pino'
import { Router } from '../router'
import { logger } from './logger'

describe('logger(options)', () => {

  let lines: Record<string, unknown>[]
  let router: Router

  beforeEach(() => {
    lines = []
    const log = pino({ level: 'info' }, {
      write: (line: string) => void lines.push(JSON.parse(line))
    })
    router = new Router({ logger: pino({ level: 'silent' }) })
      .use(logger({ logger: log }))
      .get('/users/:id', () => new Response('ok', { status: 202 }))
      .get('/boom', () => {
        throw new Error('boom')
      })
  })

  it('writes an access line', async () => {
    await router.fetch(new Request('http://localhost/users/7?full=1'))
    expect(lines).to.have.length(1)
    expect(lines[0]).to.include({
      method: 'GET',
      path: '/users/7',
      status: 202,
      msg: 'GET /users/7 202'
    })
    expect(lines[0]).to.have.property('duration').that.is.a('number')
  })

  it('writes a warning when the chain fails', async () => {
    const res = await router.fetch(new Request('http://localhost/boom'))
    expect(res).to.have.property('status', 500)
    expect(lines).to.have.length(1)
    expect(lines[0]).to.include({ level: 40, msg: 'GET /boom failed' })
  })

})
