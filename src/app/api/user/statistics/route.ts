import { NextRequest } from 'next/server'
import { errorResponse, ok } from '@/lib/api'
import { requireSession } from '@/lib/auth'
import { getServices } from '@/lib/container'

export const dynamic = 'force-dynamic'

export async function GET(request: NextRequest) {
  const session = requireSession(request)
  if ('response' in session) {
    return session.response
  }

  try {
    return ok(await getServices().sessions.statistics(session.sessionId))
  } catch (error) {
    return errorResponse(error, 'Session')
  }
}
