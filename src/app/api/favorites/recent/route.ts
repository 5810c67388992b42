import { NextRequest } from 'next/server'
import { errorResponse, ok, parseQuery } from '@/lib/api'
import { requireSession } from '@/lib/auth'
import { getServices } from '@/lib/container'
import { daysSchema } from '@/lib/schemas'
import { DEFAULT_RECENT_DAYS } from '@/lib/services/favoriteService'

export const dynamic = 'force-dynamic'

const querySchema = daysSchema(DEFAULT_RECENT_DAYS)

export async function GET(request: NextRequest) {
  const session = requireSession(request)
  if ('response' in session) {
    return session.response
  }

  try {
    const { days } = parseQuery(request, querySchema)
    return ok(await getServices().favorites.recent(session.sessionId, days))
  } catch (error) {
    return errorResponse(error, 'Favorites')
  }
}
