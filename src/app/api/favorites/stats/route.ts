import { errorResponse, ok } from '@/lib/api'
import { getServices } from '@/lib/container'

export const dynamic = 'force-dynamic'

// Favorite counts per garment category
export async function GET() {
  try {
    return ok(await getServices().favorites.statsByCategory())
  } catch (error) {
    return errorResponse(error, 'Favorites')
  }
}
