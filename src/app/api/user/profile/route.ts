import { NextRequest } from 'next/server'
import { errorResponse, ok, parseOptionalJson } from '@/lib/api'
import { requireSession } from '@/lib/auth'
import { getServices } from '@/lib/container'
import { profileSchema } from '@/lib/schemas'

export const dynamic = 'force-dynamic'

// Create the session's profile, or return the existing one
export async function POST(request: NextRequest) {
  const session = requireSession(request)
  if ('response' in session) {
    return session.response
  }

  try {
    const { profileName } = await parseOptionalJson(request, profileSchema)
    const profile = await getServices().sessions.createOrGetProfile(session.sessionId, profileName)
    return ok(profile)
  } catch (error) {
    return errorResponse(error, 'Session')
  }
}

export async function GET(request: NextRequest) {
  const session = requireSession(request)
  if ('response' in session) {
    return session.response
  }

  try {
    return ok(await getServices().sessions.getProfile(session.sessionId))
  } catch (error) {
    return errorResponse(error, 'Session')
  }
}

export async function DELETE(request: NextRequest) {
  const session = requireSession(request)
  if ('response' in session) {
    return session.response
  }

  try {
    await getServices().sessions.deleteProfile(session.sessionId)
    return ok(null, 'Profile deleted successfully')
  } catch (error) {
    return errorResponse(error, 'Session')
  }
}
