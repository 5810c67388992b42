import { NextRequest } from 'next/server'
import { errorResponse, ok, parseQuery } from '@/lib/api'
import { getServices } from '@/lib/container'
import { analyticsSchema } from '@/lib/schemas'
import { DEFAULT_ANALYTICS_LIMIT, DEFAULT_TRENDING_DAYS } from '@/lib/services/favoriteService'

export const dynamic = 'force-dynamic'

const querySchema = analyticsSchema(DEFAULT_TRENDING_DAYS, DEFAULT_ANALYTICS_LIMIT).pick({ limit: true })

export async function GET(request: NextRequest) {
  try {
    const { limit } = parseQuery(request, querySchema)
    return ok(await getServices().favorites.popular(limit))
  } catch (error) {
    return errorResponse(error, 'Favorites')
  }
}
