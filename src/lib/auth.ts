import crypto from 'crypto'
import type { NextRequest, NextResponse } from 'next/server'
import { fail } from '@/lib/api'

export const SESSION_HEADER = 'x-session-id'
export const ADMIN_TOKEN_HEADER = 'x-admin-token'

const MAX_SESSION_ID_LENGTH = 255

/**
 * Session id from the `sessionId` query parameter or the session header.
 * Sessions are anonymous: whoever holds the id owns the profile.
 */
export function getSessionId(request: NextRequest): string | null {
  const fromQuery = request.nextUrl.searchParams.get('sessionId')?.trim()
  const fromHeader = request.headers.get(SESSION_HEADER)?.trim()
  const sessionId = fromQuery || fromHeader
  if (!sessionId || sessionId.length > MAX_SESSION_ID_LENGTH) return null
  return sessionId
}

export function requireSession(request: NextRequest): { sessionId: string } | { response: NextResponse } {
  const sessionId = getSessionId(request)
  if (!sessionId) {
    return { response: fail('sessionId is required', 'VALIDATION', 400) }
  }
  return { sessionId }
}

function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given)
  const b = Buffer.from(expected)
  return a.length === b.length && crypto.timingSafeEqual(a, b)
}

// Admin routes compare the header against ADMIN_API_TOKEN
export function requireAdmin(
  request: NextRequest,
  adminToken: string | undefined
): { admin: true } | { response: NextResponse } {
  if (!adminToken) {
    console.error('[Auth] ADMIN_API_TOKEN is not configured')
    return { response: fail('Admin API is not configured', 'CONFIG', 503) }
  }

  const given = request.headers.get(ADMIN_TOKEN_HEADER)
  if (!given || !tokensMatch(given, adminToken)) {
    console.warn('[Auth] Rejected admin request:', request.nextUrl.pathname)
    return { response: fail('Unauthorized', 'UNAUTHORIZED', 401) }
  }
  return { admin: true }
}
