/**
 * Virtual try-on workflow
 *
 * Resolves the profile, garment and photo, downloads both images, asks the
 * image model for a composite and stores it. `generate` never throws: every
 * failure comes back as a FAILED (or, with a placeholder configured,
 * DEGRADED) result.
 */
import { errorKindOf, errorMessageOf, forbidden, notFound, publicErrorMessage } from '@/lib/errors'
import type { FetchedImage } from '@/lib/http'
import type {
  GarmentImageRepository,
  GarmentRepository,
  TryonResultRepository,
  UserPhotoRepository,
  UserProfileRepository,
} from '@/lib/repositories'
import type { FileStorage } from '@/lib/storage'
import type { ImageGenerator } from '@/lib/tryon/gemini-image'
import {
  availableModels,
  DEFAULT_TRY_ON_MODEL,
  resolveTryOnModel,
  type PromptStrategy,
  type TryOnModelId,
  type TryOnModelInfo,
} from '@/lib/tryon/models'
import {
  toPage,
  type Garment,
  type Page,
  type PageRequest,
  type TryonRequest,
  type TryonResult,
  type TryonResultDto,
  type TryonSuccessDto,
  type UserPhoto,
  type UserProfile,
} from '@/types'
import { primaryImageOf } from './garmentDto'
import { photoDisplayName, requireOwnedPhoto, requireProfile } from './profiles'

export interface TryOnServiceDeps {
  profiles: UserProfileRepository
  garments: GarmentRepository
  garmentImages: GarmentImageRepository
  photos: UserPhotoRepository
  tryonResults: TryonResultRepository
  storage: FileStorage
  imageGenerator: ImageGenerator
  promptStrategies: Record<TryOnModelId, PromptStrategy>
  fetchImage: (url: string) => Promise<FetchedImage>
  // Returned instead of a failure when generation itself fails
  placeholderImageUrl?: string
  clock?: () => number
}

export type TryOnService = ReturnType<typeof createTryOnService>

export function tryonNamespace(profileId: number, garmentId: number): string {
  return `tryon-results/${profileId}/${garmentId}`
}

export function createTryOnService(deps: TryOnServiceDeps) {
  const clock = deps.clock ?? Date.now

  async function primaryImageUrl(garmentId: number): Promise<string | null> {
    const images = await deps.garmentImages.findByGarmentIds([garmentId])
    return primaryImageOf(images)?.imageUrl ?? null
  }

  async function requireGarment(garmentId: number): Promise<Garment> {
    const garment = await deps.garments.findById(garmentId)
    if (!garment) {
      throw notFound(`Garment not found with ID: ${garmentId}`)
    }
    return garment
  }

  function toSuccessDto(
    result: TryonResult,
    garment: Garment | undefined,
    garmentImageUrl: string | null,
    photo: UserPhoto | undefined,
    processingTimeMs?: number
  ): TryonSuccessDto {
    return {
      status: 'SUCCESS',
      id: result.id,
      resultImageUrl: result.resultImageUrl,
      aiModelUsed: result.aiModelUsed ?? DEFAULT_TRY_ON_MODEL,
      garmentId: result.garmentId,
      garmentName: garment?.garmentName ?? null,
      garmentImageUrl,
      userPhotoId: result.userPhotoId,
      userPhotoName: photo ? photoDisplayName(photo) : null,
      userPhotoUrl: photo?.photoUrl ?? null,
      createdAt: result.createdAt,
      processingTimeMs,
    }
  }

  async function requireOwnedResult(profile: UserProfile, resultId: number): Promise<TryonResult> {
    const result = await deps.tryonResults.findById(resultId)
    if (!result) {
      throw notFound(`Try-on result not found with ID: ${resultId}`)
    }
    if (result.userProfileId !== profile.id) {
      throw forbidden(`Try-on result ${resultId} does not belong to this session`)
    }
    return result
  }

  async function generate(sessionId: string, request: TryonRequest): Promise<TryonResultDto> {
    const startedAt = clock()
    const createdAt = new Date(startedAt).toISOString()
    let modelUsed = request.aiModel?.trim() || DEFAULT_TRY_ON_MODEL
    // Set once the remote part of the workflow has started
    let generating = false

    try {
      const model = resolveTryOnModel(request.aiModel)
      modelUsed = model

      const profile = await requireProfile(deps.profiles, sessionId)
      const garment = await requireGarment(request.garmentId)
      const photo = await requireOwnedPhoto(deps.photos, request.userPhotoId, profile)
      const garmentImageUrl = await primaryImageUrl(garment.id)
      if (!garmentImageUrl) {
        throw notFound(`No primary image found for garment: ${garment.id}`)
      }

      generating = true
      console.log(`[TryOn] Generating for profile ${profile.id}, garment ${garment.id}, photo ${photo.id} with ${model}`)

      const garmentImage = await deps.fetchImage(garmentImageUrl)
      const photoImage = await deps.fetchImage(photo.photoUrl)
      const prompt = await deps.promptStrategies[model]({
        garment,
        customPrompt: request.customPrompt,
        style: request.style,
      })
      const generated = await deps.imageGenerator.generate(garmentImage, photoImage, prompt)
      generating = false

      const resultImageUrl = await deps.storage.store(generated.bytes, {
        namespace: tryonNamespace(profile.id, garment.id),
        contentType: generated.mimeType,
      })

      let saved: TryonResult
      try {
        saved = await deps.tryonResults.insert({
          userProfileId: profile.id,
          garmentId: garment.id,
          userPhotoId: photo.id,
          resultImageUrl,
          aiModelUsed: model,
        })
      } catch (error) {
        await deps.storage.deleteMany([resultImageUrl])
        throw error
      }

      const processingTimeMs = clock() - startedAt
      console.log(`[TryOn] Result ${saved.id} stored in ${processingTimeMs}ms`)
      return toSuccessDto(saved, garment, garmentImageUrl, photo, processingTimeMs)
    } catch (error) {
      const errorCode = errorKindOf(error)
      const errorMessage = publicErrorMessage(error)
      const processingTimeMs = clock() - startedAt
      const base = {
        aiModelUsed: modelUsed,
        garmentId: request.garmentId,
        userPhotoId: request.userPhotoId,
        createdAt,
      }

      if (generating && deps.placeholderImageUrl) {
        console.warn(`[TryOn] Generation failed (${errorCode}), returning placeholder image:`, errorMessageOf(error))
        return {
          ...base,
          status: 'DEGRADED',
          resultImageUrl: deps.placeholderImageUrl,
          errorMessage,
          errorCode,
          processingTimeMs,
        }
      }

      console.error(`[TryOn] Generation failed for session ${sessionId} (${errorCode}):`, errorMessageOf(error))
      return { ...base, status: 'FAILED', errorMessage, errorCode, processingTimeMs }
    }
  }

  async function listResults(sessionId: string, page: PageRequest): Promise<Page<TryonResultDto>> {
    const profile = await requireProfile(deps.profiles, sessionId)
    const slice = await deps.tryonResults.findByProfileId(profile.id, page)

    const garmentIds = Array.from(new Set(slice.items.map(result => result.garmentId)))
    const [garments, images, photos] = await Promise.all([
      deps.garments.findByIds(garmentIds),
      deps.garmentImages.findByGarmentIds(garmentIds),
      deps.photos.findByProfileId(profile.id),
    ])
    const garmentById = new Map(garments.map(garment => [garment.id, garment]))
    const photoById = new Map(photos.map(photo => [photo.id, photo]))

    const items = slice.items.map(result =>
      toSuccessDto(
        result,
        garmentById.get(result.garmentId),
        primaryImageOf(images.filter(image => image.garmentId === result.garmentId))?.imageUrl ?? null,
        photoById.get(result.userPhotoId)
      )
    )
    return toPage({ items, total: slice.total }, page)
  }

  async function getResult(sessionId: string, resultId: number): Promise<TryonSuccessDto> {
    const profile = await requireProfile(deps.profiles, sessionId)
    const result = await requireOwnedResult(profile, resultId)
    const [garment, photo, garmentImageUrl] = await Promise.all([
      deps.garments.findById(result.garmentId),
      deps.photos.findById(result.userPhotoId),
      primaryImageUrl(result.garmentId),
    ])
    return toSuccessDto(result, garment ?? undefined, garmentImageUrl, photo ?? undefined)
  }

  async function deleteResult(sessionId: string, resultId: number): Promise<void> {
    const profile = await requireProfile(deps.profiles, sessionId)
    const result = await requireOwnedResult(profile, resultId)
    await deps.tryonResults.delete(result.id)
    await deps.storage.deleteMany([result.resultImageUrl])
    console.log(`[TryOn] Deleted result ${result.id} for profile ${profile.id}`)
  }

  return {
    generate,
    listResults,
    getResult,
    deleteResult,
    availableModels: (): TryOnModelInfo[] => availableModels(),
  }
}
