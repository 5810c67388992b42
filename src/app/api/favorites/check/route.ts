import { NextRequest } from 'next/server'
import { errorResponse, ok, parseQuery } from '@/lib/api'
import { requireSession } from '@/lib/auth'
import { getServices } from '@/lib/container'
import { garmentIdSchema } from '@/lib/schemas'

export const dynamic = 'force-dynamic'

// GET /api/favorites/check?sessionId=&garmentId=3
export async function GET(request: NextRequest) {
  const session = requireSession(request)
  if ('response' in session) {
    return session.response
  }

  try {
    const { garmentId } = parseQuery(request, garmentIdSchema)
    const favorited = await getServices().favorites.isFavorited(session.sessionId, garmentId)
    return ok({ favorited })
  } catch (error) {
    return errorResponse(error, 'Favorites')
  }
}
