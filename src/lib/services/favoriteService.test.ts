import { beforeEach, describe, expect, it, vi } from 'vitest'
import { createFakeRepositories, FakeClock, garmentInput } from '@/test/fakes'
import { createFavoriteService, rankByFrequency } from './favoriteService'

const DAY_MS = 24 * 60 * 60 * 1000

async function setup() {
  const clock = new FakeClock()
  const { db, repositories } = createFakeRepositories(clock)
  const service = createFavoriteService({ ...repositories, clock: clock.now })

  await repositories.profiles.insert('sess-1', null)
  await repositories.profiles.insert('sess-2', null)
  await repositories.garments.insert(garmentInput())
  await repositories.garments.insert(
    garmentInput({ nameId: 'VES001', garmentName: 'Kasavu Vesti', category: 'Vesti', color: 'Cream' })
  )
  await repositories.garments.insert(garmentInput({ nameId: 'SAR002', garmentName: 'Cotton Saree' }))

  return { clock, db, repositories, service }
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {})
  return () => {
    vi.restoreAllMocks()
  }
})

describe('rankByFrequency', () => {
  it('orders by count then by id', () => {
    expect(rankByFrequency([3, 1, 3, 2, 1, 5], 10)).toEqual([1, 3, 2, 5])
    expect(rankByFrequency([3, 1, 3, 2, 1, 5], 2)).toEqual([1, 3])
    expect(rankByFrequency([], 5)).toEqual([])
  })
})

describe('favorites', () => {
  it('adds a favorite once', async () => {
    const { db, service } = await setup()

    expect(await service.add('sess-1', 1)).toBe(true)
    expect(await service.add('sess-1', 1)).toBe(false)
    expect(db.favorites).toHaveLength(1)
    expect(await service.isFavorited('sess-1', 1)).toBe(true)
    expect(await service.isFavorited('sess-2', 1)).toBe(false)
  })

  it('rejects unknown garments and sessions', async () => {
    const { service } = await setup()

    await expect(service.add('sess-1', 99)).rejects.toThrow('Garment not found with ID: 99')
    await expect(service.add('sess-404', 1)).rejects.toThrow('User profile not found for session: sess-404')
  })

  it('treats a concurrent duplicate insert as already favorited', async () => {
    const { repositories, clock } = await setup()
    const service = createFavoriteService({
      ...repositories,
      favorites: { ...repositories.favorites, exists: async () => false },
      clock: clock.now,
    })
    await repositories.favorites.insert(1, 1)

    expect(await service.add('sess-1', 1)).toBe(false)
  })

  it('removes and toggles', async () => {
    const { service } = await setup()
    await service.add('sess-1', 1)

    expect(await service.remove('sess-1', 1)).toBe(true)
    expect(await service.remove('sess-1', 1)).toBe(false)

    expect(await service.toggle('sess-1', 2)).toBe(true)
    expect(await service.isFavorited('sess-1', 2)).toBe(true)
    expect(await service.toggle('sess-1', 2)).toBe(false)
    expect(await service.count('sess-1')).toBe(0)
  })

  it('lists garments newest favorite first', async () => {
    const { clock, service } = await setup()
    await service.add('sess-1', 1)
    clock.advance(1000)
    await service.add('sess-1', 2)
    clock.advance(1000)
    await service.add('sess-1', 3)

    const page = await service.list('sess-1', { page: 0, size: 2 })

    expect(page.items.map(garment => garment.nameId)).toEqual(['SAR002', 'VES001'])
    expect(page).toMatchObject({ total: 3, hasMore: true })
    expect((await service.all('sess-1')).map(garment => garment.id)).toEqual([3, 2, 1])
    expect((await service.byCategory('sess-1', ' saree ')).map(garment => garment.id)).toEqual([3, 1])
  })

  it('returns favorites added within the window', async () => {
    const { clock, service } = await setup()
    await service.add('sess-1', 1)
    clock.advance(8 * DAY_MS)
    await service.add('sess-1', 2)

    expect((await service.recent('sess-1')).map(garment => garment.id)).toEqual([2])
    expect((await service.recent('sess-1', 30)).map(garment => garment.id)).toEqual([2, 1])
  })

  it('reports which of the given garments are favorites', async () => {
    const { service } = await setup()
    await service.add('sess-1', 1)
    await service.add('sess-1', 3)

    expect(await service.favoritedIds('sess-1', [3, 2, 3, 1])).toEqual([1, 3])
  })

  it('clears every favorite of the session', async () => {
    const { service } = await setup()
    await service.add('sess-1', 1)
    await service.add('sess-1', 2)
    await service.add('sess-2', 1)

    expect(await service.clear('sess-1')).toBe(2)
    expect(await service.count('sess-1')).toBe(0)
    expect(await service.count('sess-2')).toBe(1)
  })
})

describe('analytics', () => {
  it('ranks trending garments within the window', async () => {
    const { clock, service } = await setup()
    await service.add('sess-1', 2)
    clock.advance(10 * DAY_MS)
    await service.add('sess-1', 1)
    await service.add('sess-2', 1)
    await service.add('sess-2', 3)

    expect(await service.trending()).toEqual([1, 3])
    expect(await service.trending(30, 1)).toEqual([1])
  })

  it('reports popular garments and category counts', async () => {
    const { service } = await setup()
    await service.add('sess-1', 1)
    await service.add('sess-2', 1)
    await service.add('sess-2', 2)
    await service.add('sess-2', 3)

    expect(await service.popular(2)).toEqual([
      { garmentId: 1, favoriteCount: 2 },
      { garmentId: 2, favoriteCount: 1 },
    ])
    expect(await service.statsByCategory()).toEqual([
      { category: 'Saree', favoriteCount: 3 },
      { category: 'Vesti', favoriteCount: 1 },
    ])
  })
})
