import { NextRequest } from 'next/server'
import { errorResponse, ok, parseWith, readMultipart } from '@/lib/api'
import { requireAdmin } from '@/lib/auth'
import { getServices } from '@/lib/container'
import { newGarmentFormSchema } from '@/lib/schemas'
import { readUploadedFile } from '@/lib/uploads'

export const dynamic = 'force-dynamic'
export const maxDuration = 60

// POST /api/admin/garments (multipart: garment fields + one or more `images`)
export async function POST(request: NextRequest) {
  try {
    const services = getServices()
    const auth = requireAdmin(request, services.config.adminToken)
    if ('response' in auth) {
      return auth.response
    }

    const form = await readMultipart(request)
    const { primaryImageIndex, ...input } = parseWith(newGarmentFormSchema, form.fields)
    const files = await Promise.all(form.files('images').map(readUploadedFile))

    const garment = await services.garments.createWithImages(input, files, primaryImageIndex)
    return ok(garment, 'Garment created successfully', 201)
  } catch (error) {
    return errorResponse(error, 'Admin')
  }
}
