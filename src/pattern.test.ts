import { expect } from 'chai'
import { ConflictError, PatternError } from './errors'
import { joinPaths, parsePattern, tokenize } from './pattern'

describe('parsePattern(path)', () => {

  it('splits static, dynamic and catch-all segments', () => {
    expect(parsePattern('/files/:owner/*rest')).to.deep.equal({
      path: '/files/:owner/*rest',
      segments: [
        { type: 'static', value: 'files' },
        { type: 'param', name: 'owner' },
        { type: 'wildcard', name: 'rest' }
      ],
      keys: [['owner', 1, false], ['rest', 2, true]]
    })
  })

  it('names a bare catch-all *', () => {
    expect(parsePattern('/static/*').keys).to.deep.equal([['*', 1, true]])
  })

  it('parses the root path to no segments', () => {
    expect(parsePattern('/').segments).to.deep.equal([])
  })

  it('requires a leading slash', () => {
    expect(() => parsePattern('users')).to.throw(PatternError, 'invalid route users - must start with /')
  })

  it('rejects bad parameter names', () => {
    expect(() => parsePattern('/users/:'))
      .to.throw(PatternError, 'invalid route /users/: - bad parameter name :')
    expect(() => parsePattern('/users/:user-id'))
      .to.throw(PatternError, 'invalid route /users/:user-id - bad parameter name :user-id')
  })

  it('rejects bad catch-all names', () => {
    expect(() => parsePattern('/files/*a.b'))
      .to.throw(PatternError, 'invalid route /files/*a.b - bad catch-all name *a.b')
  })

  it('rejects a catch-all before the last segment', () => {
    expect(() => parsePattern('/files/*/raw'))
      .to.throw(PatternError, 'invalid route /files/*/raw - catch-all is only allowed at the end')
  })

  it('rejects a parameter name shared with the catch-all', () => {
    expect(() => parsePattern('/:path/*path'))
      .to.throw(ConflictError, 'route /:path/*path repeats parameter path')
  })

})

describe('joinPaths(prefix, path)', () => {

  it('joins a prefix and a path', () => {
    expect(joinPaths('/api', '/users')).to.equal('/api/users')
  })

  it('drops a trailing slash from the prefix', () => {
    expect(joinPaths('/api/', '/users')).to.equal('/api/users')
  })

  it('adds a missing slash to the path', () => {
    expect(joinPaths('/api', 'users')).to.equal('/api/users')
  })

  it('maps the root path to the prefix', () => {
    expect(joinPaths('/api', '/')).to.equal('/api')
    expect(joinPaths('/', '/')).to.equal('/')
  })

  it('leaves the path alone under an empty prefix', () => {
    expect(joinPaths('', '/users')).to.equal('/users')
  })

})

describe('tokenize(segments, caseSensitive)', () => {

  it('erases parameter names', () => {
    const { segments } = parsePattern('/Users/:id/*rest')
    expect(tokenize(segments, true)).to.deep.equal(['Users', ':', '*'])
    expect(tokenize(segments, false)).to.deep.equal(['users', ':', '*'])
  })

})
