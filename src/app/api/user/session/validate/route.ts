import { NextRequest } from 'next/server'
import { errorResponse, ok } from '@/lib/api'
import { getSessionId } from '@/lib/auth'
import { getServices } from '@/lib/container'

export const dynamic = 'force-dynamic'

export async function GET(request: NextRequest) {
  try {
    const valid = await getServices().sessions.isValidSession(getSessionId(request))
    return ok({ valid })
  } catch (error) {
    return errorResponse(error, 'Session')
  }
}
