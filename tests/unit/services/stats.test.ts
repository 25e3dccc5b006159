import { describe, it, expect, beforeEach, vi } from 'vitest'
import { StatsService } from '../../../src/services/stats.js'
import { InMemoryStore } from '../../helpers/in-memory-store.js'

describe('StatsService', () => {
  let store: InMemoryStore
  let service: StatsService

  beforeEach(() => {
    store = new InMemoryStore()
    service = new StatsService(store.repositories)
  })

  it('debe retornar ceros sin PRs', async () => {
    expect(await service.getStats()).toEqual({
      prStats: { totalPrs: 0, openPrs: 0, mergedPrs: 0, avgReviewersPerPr: 0 },
      userStats: {},
    })
  })

  it('debe agregar por PR y por reviewer', async () => {
    store
      .seedTeam('backend', [['u1', true], ['u2', true], ['u3', true]])
      .seedPullRequest({ id: 'pr1', authorId: 'u1', reviewers: ['u2', 'u3'] })
      .seedPullRequest({ id: 'pr2', authorId: 'u1', reviewers: ['u2'], status: 'MERGED' })
      .seedPullRequest({ id: 'pr3', authorId: 'u2', reviewers: [] })

    const stats = await service.getStats()

    // 3 reviewers en 3 PRs
    expect(stats.prStats).toEqual({ totalPrs: 3, openPrs: 2, mergedPrs: 1, avgReviewersPerPr: 1 })
    expect(stats.userStats).toEqual({
      u2: { userId: 'u2', username: 'name-u2', totalAssignments: 2, openPrs: 1, mergedPrs: 1 },
      u3: { userId: 'u3', username: 'name-u3', totalAssignments: 1, openPrs: 1, mergedPrs: 0 },
    })
  })

  it('debe redondear el promedio a dos decimales', async () => {
    store
      .seedTeam('backend', [['u1', true], ['u2', true], ['u3', true]])
      .seedPullRequest({ id: 'pr1', authorId: 'u1', reviewers: ['u2', 'u3'] })
      .seedPullRequest({ id: 'pr2', authorId: 'u1', reviewers: ['u2', 'u3'] })
      .seedPullRequest({ id: 'pr3', authorId: 'u1', reviewers: ['u2'] })

    const stats = await service.getStats()

    // 5 / 3 = 1.666...
    expect(stats.prStats.avgReviewersPerPr).toBe(1.67)
  })

  it('debe usar "unknown" si falla el lookup del usuario', async () => {
    store
      .seedTeam('backend', [['u1', true], ['u2', true]])
      .seedPullRequest({ id: 'pr1', authorId: 'u1', reviewers: ['u2'] })
    vi.spyOn(store.repositories.users, 'get').mockRejectedValueOnce(new Error('connection reset'))

    const stats = await service.getStats()

    expect(stats.userStats.u2?.username).toBe('unknown')
  })
})
