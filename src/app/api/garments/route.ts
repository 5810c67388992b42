import { NextRequest } from 'next/server'
import { errorResponse, ok, parseQuery } from '@/lib/api'
import { getServices } from '@/lib/container'
import { garmentSearchSchema } from '@/lib/schemas'

export const dynamic = 'force-dynamic'

// GET /api/garments?searchTerm=&categories=a,b&colors=&minPrice=&maxPrice=&sortBy=&page=&size=
export async function GET(request: NextRequest) {
  try {
    const filter = parseQuery(request, garmentSearchSchema)
    const page = await getServices().garments.search(filter)
    return ok(page)
  } catch (error) {
    return errorResponse(error, 'Garments')
  }
}
