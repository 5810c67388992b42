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
    const added = await getServices().favorites.add(session.sessionId, garmentId)
    return ok({ added }, added ? 'Added to favorites' : 'Already in favorites')
  } catch (error) {
    return errorResponse(error, 'Favorites')
  }
}
