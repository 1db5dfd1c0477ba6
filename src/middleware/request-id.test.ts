import { expect } from 'chai'
import pino from 'pino'
import { Router } from '../router'
import { requestId, type RequestIdOptions } from './request-id'

const logger = pino({ level: 'silent' })

describe('requestId(options)', () => {

  const build = (options: RequestIdOptions = {}) => new Router({ logger })
    .use(requestId({ generate: () => 'generated-id', ...options }))
    .get('/', ({ state }) => new Response(String(state.requestId)))

  it('generates an id, stores it in state and echoes it', async () => {
    const res = await build().fetch(new Request('http://localhost/'))
    expect(await res.text()).to.equal('generated-id')
    expect(res.headers.get('x-request-id')).to.equal('generated-id')
  })

  it('reuses an inbound id', async () => {
    const res = await build().fetch(new Request('http://localhost/', {
      headers: { 'x-request-id': 'from-client' }
    }))
    expect(await res.text()).to.equal('from-client')
  })

  it('ignores the inbound id when told not to trust it', async () => {
    const res = await build({ trustHeader: false }).fetch(new Request('http://localhost/', {
      headers: { 'x-request-id': 'from-client' }
    }))
    expect(await res.text()).to.equal('generated-id')
  })

  it('uses a custom header', async () => {
    const res = await build({ header: 'X-Trace-Id' }).fetch(new Request('http://localhost/'))
    expect(res.headers.get('x-trace-id')).to.equal('generated-id')
  })

  it('generates UUIDs by default', async () => {
    const router = new Router({ logger })
      .use(requestId())
      .get('/', () => new Response('ok'))
    const res = await router.fetch(new Request('http://localhost/'))
    expect(res.headers.get('x-request-id')).to.match(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/)
  })

})
