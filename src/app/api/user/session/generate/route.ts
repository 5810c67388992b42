import { errorResponse, ok } from '@/lib/api'
import { getServices } from '@/lib/container'

export const dynamic = 'force-dynamic'

// A fresh session id; the profile is created on first POST /api/user/profile
export async function GET() {
  try {
    const sessionId = await getServices().sessions.generateSessionId()
    return ok({ sessionId })
  } catch (error) {
    return errorResponse(error, 'Session')
  }
}
