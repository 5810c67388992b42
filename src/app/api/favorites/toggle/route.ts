import { NextRequest } from 'next/server'
import { errorResponse, ok, parseJson } from '@/lib/api'
import { requireSession } from '@/lib/auth'
import { getServices } from '@/lib/container'
import { garmentIdSchema } from '@/lib/schemas'

export const dynamic = 'force-dynamic'

export async function POST(request: NextRequest) {
  const session = requireSession(request)
  if ('response' in session) {
    return session.response
  }

  try {
    const { garmentId } = await parseJson(request, garmentIdSchema)
    const favorited = await getServices().favorites.toggle(session.sessionId, garmentId)
    return ok({ favorited }, favorited ? 'Added to favorites' : 'Removed from favorites')
  } catch (error) {
    return errorResponse(error, 'Favorites')
  }
}
