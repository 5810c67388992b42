import { NextRequest } from 'next/server'
import { errorResponse, ok, parseJson } from '@/lib/api'
import { requireSession } from '@/lib/auth'
import { getServices } from '@/lib/container'
import { garmentIdsSchema } from '@/lib/schemas'

export const dynamic = 'force-dynamic'

// POST /api/favorites/check-multiple with body [1, 2, 3]; returns the favorited subset
export async function POST(request: NextRequest) {
  const session = requireSession(request)
  if ('response' in session) {
    return session.response
  }

  try {
    const garmentIds = await parseJson(request, garmentIdsSchema)
    return ok(await getServices().favorites.favoritedIds(session.sessionId, garmentIds))
  } catch (error) {
    return errorResponse(error, 'Favorites')
  }
}
