import { errorResponse, ok } from '@/lib/api'
import { getServices } from '@/lib/container'

export const dynamic = 'force-dynamic'

export async function GET() {
  try {
    return ok(await getServices().garments.garmentTypes())
  } catch (error) {
    return errorResponse(error, 'Garments')
  }
}
