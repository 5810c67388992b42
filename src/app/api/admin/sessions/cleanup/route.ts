import { NextRequest } from 'next/server'
import { errorResponse, ok, parseQuery } from '@/lib/api'
import { requireAdmin } from '@/lib/auth'
import { getServices } from '@/lib/container'
import { daysSchema } from '@/lib/schemas'

export const dynamic = 'force-dynamic'

const DEFAULT_INACTIVE_DAYS = 30

const querySchema = daysSchema(DEFAULT_INACTIVE_DAYS)

// Deletes old session profiles that never uploaded, favorited or generated anything
export async function POST(request: NextRequest) {
  try {
    const services = getServices()
    const auth = requireAdmin(request, services.config.adminToken)
    if ('response' in auth) {
      return auth.response
    }

    const { days } = parseQuery(request, querySchema)
    const removed = await services.sessions.cleanupOldSessions(days)
    return ok({ removed, days }, `Removed ${removed} inactive sessions`)
  } catch (error) {
    return errorResponse(error, 'Admin')
  }
}
