import { NextRequest } from 'next/server'
import { errorResponse, ok, parseQuery } from '@/lib/api'
import { requireSession } from '@/lib/auth'
import { getServices } from '@/lib/container'
import { pageSchema } from '@/lib/schemas'

export const dynamic = 'force-dynamic'

// GET /api/tryon/results?sessionId=&page=0&size=20
export async function GET(request: NextRequest) {
  const session = requireSession(request)
  if ('response' in session) {
    return session.response
  }

  try {
    const page = parseQuery(request, pageSchema)
    return ok(await getServices().tryOn.listResults(session.sessionId, page))
  } catch (error) {
    return errorResponse(error, 'TryOn')
  }
}
