import { ok } from '@/lib/api'
import { availableModels } from '@/lib/tryon/models'

export const dynamic = 'force-dynamic'

export async function GET() {
  return ok(availableModels())
}
