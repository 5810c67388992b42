import { NextRequest } from 'next/server'
import { errorResponse, ok, parseJson } from '@/lib/api'
import { requireSession } from '@/lib/auth'
import { getServices } from '@/lib/container'
import { nameSchema } from '@/lib/schemas'

export const dynamic = 'force-dynamic'

export async function PUT(request: NextRequest) {
  const session = requireSession(request)
  if ('response' in session) {
    return session.response
  }

  try {
    const { name } = await parseJson(request, nameSchema)
    const profile = await getServices().sessions.updateProfileName(session.sessionId, name)
    return ok(profile, 'Profile name updated')
  } catch (error) {
    return errorResponse(error, 'Session')
  }
}
