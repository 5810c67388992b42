import { ok } from '@/lib/api'

export const dynamic = 'force-dynamic'

export async function GET() {
  return ok({ status: 'UP', service: 'textile-tryon', timestamp: new Date().toISOString() })
}
