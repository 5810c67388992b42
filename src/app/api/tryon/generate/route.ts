import { NextRequest } from 'next/server'
import { errorResponse, fail, ok, parseJson } from '@/lib/api'
import { requireSession } from '@/lib/auth'
import { getServices } from '@/lib/container'
import { STATUS_BY_KIND } from '@/lib/errors'
import { tryonRequestSchema } from '@/lib/schemas'

export const dynamic = 'force-dynamic'
export const maxDuration = 120 // 2 minutes

export async function POST(request: NextRequest) {
  const session = requireSession(request)
  if ('response' in session) {
    return session.response
  }

  try {
    const body = await parseJson(request, tryonRequestSchema)
    const result = await getServices().tryOn.generate(session.sessionId, body)

    switch (result.status) {
      case 'SUCCESS':
        return ok(result, 'Try-on generated successfully')
      case 'DEGRADED':
        return ok(result, 'Try-on generation failed; placeholder image returned')
      case 'FAILED':
        return fail(result.errorMessage, 'TRYON_FAILED', STATUS_BY_KIND[result.errorCode])
    }
  } catch (error) {
    return errorResponse(error, 'TryOn')
  }
}
