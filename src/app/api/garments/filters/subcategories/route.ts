import { NextRequest } from 'next/server'
import { z } from 'zod'
import { errorResponse, ok, parseQuery } from '@/lib/api'
import { getServices } from '@/lib/container'

export const dynamic = 'force-dynamic'

const querySchema = z.object({ category: z.string().trim().min(1, 'category is required') })

// GET /api/garments/filters/subcategories?category=Saree
export async function GET(request: NextRequest) {
  try {
    const { category } = parseQuery(request, querySchema)
    return ok(await getServices().garments.subcategories(category))
  } catch (error) {
    return errorResponse(error, 'Garments')
  }
}
