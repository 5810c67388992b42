import { NextRequest } from 'next/server'
import { errorResponse, ok, readMultipart } from '@/lib/api'
import { requireSession } from '@/lib/auth'
import { getServices } from '@/lib/container'
import { validationError } from '@/lib/errors'
import { readUploadedFile } from '@/lib/uploads'

export const dynamic = 'force-dynamic'
export const maxDuration = 60

// POST /api/user/photos/upload (multipart: `photo`, optional `photoName`)
export async function POST(request: NextRequest) {
  const session = requireSession(request)
  if ('response' in session) {
    return session.response
  }

  try {
    const form = await readMultipart(request)
    const [file] = form.files('photo')
    if (!file) {
      throw validationError('photo is required')
    }

    const photo = await getServices().sessions.uploadPhoto(
      session.sessionId,
      await readUploadedFile(file),
      form.fields.photoName
    )
    return ok(photo, 'Photo uploaded successfully', 201)
  } catch (error) {
    return errorResponse(error, 'Photos')
  }
}
