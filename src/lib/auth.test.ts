import { NextRequest } from 'next/server'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { ADMIN_TOKEN_HEADER, getSessionId, requireAdmin, requireSession, SESSION_HEADER } from './auth'

afterEach(() => {
  vi.restoreAllMocks()
})

describe('getSessionId', () => {
  it('prefers the query parameter over the header', () => {
    const request = new NextRequest('http://localhost/api/user/profile?sessionId=sess-query', {
      headers: { [SESSION_HEADER]: 'sess-header' },
    })

    expect(getSessionId(request)).toBe('sess-query')
  })

  it('falls back to the header', () => {
    const request = new NextRequest('http://localhost/api/user/profile', {
      headers: { [SESSION_HEADER]: ' sess-header ' },
    })

    expect(getSessionId(request)).toBe('sess-header')
  })

  it('rejects blank and oversized ids', () => {
    expect(getSessionId(new NextRequest('http://localhost/api?sessionId=%20'))).toBeNull()
    expect(getSessionId(new NextRequest(`http://localhost/api?sessionId=${'a'.repeat(256)}`))).toBeNull()
  })
})

describe('requireSession', () => {
  it('returns a 400 response without a session', async () => {
    const result = requireSession(new NextRequest('http://localhost/api/favorites'))

    if (!('response' in result)) throw new Error('expected a response')
    expect(result.response.status).toBe(400)
    expect(await result.response.json()).toEqual({ success: false, error: 'sessionId is required', code: 'VALIDATION' })
  })

  it('returns the session id', () => {
    expect(requireSession(new NextRequest('http://localhost/api/favorites?sessionId=sess-1'))).toEqual({
      sessionId: 'sess-1',
    })
  })
})

describe('requireAdmin', () => {
  const adminRequest = (token?: string) =>
    new NextRequest('http://localhost/api/admin/garments', {
      headers: token === undefined ? {} : { [ADMIN_TOKEN_HEADER]: token },
    })

  it('is unavailable when no token is configured', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {})

    const result = requireAdmin(adminRequest('test-admin-token'), undefined)

    expect('response' in result && result.response.status).toBe(503)
  })

  it('rejects a missing or wrong token', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})

    const missing = requireAdmin(adminRequest(), 'test-admin-token')
    const wrong = requireAdmin(adminRequest('test-admin-tokem'), 'test-admin-token')

    expect('response' in missing && missing.response.status).toBe(401)
    expect('response' in wrong && wrong.response.status).toBe(401)
  })

  it('accepts the configured token', () => {
    expect(requireAdmin(adminRequest('test-admin-token'), 'test-admin-token')).toEqual({ admin: true })
  })
})
