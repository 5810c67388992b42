import { NextRequest } from 'next/server'
import { errorResponse, ok } from '@/lib/api'
import { requireSession } from '@/lib/auth'
import { getServices } from '@/lib/container'

export const dynamic = 'force-dynamic'

export async function DELETE(request: NextRequest) {
  const session = requireSession(request)
  if ('response' in session) {
    return session.response
  }

  try {
    const removed = await getServices().favorites.clear(session.sessionId)
    return ok({ removed }, `Removed ${removed} favorites`)
  } catch (error) {
    return errorResponse(error, 'Favorites')
  }
}
