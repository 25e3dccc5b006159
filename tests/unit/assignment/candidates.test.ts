import { describe, it, expect, vi, beforeEach } from 'vitest'
import {
  createSearchContext,
  findReplacementCandidates,
} from '../../../src/assignment/candidates.js'
import { defaultCandidateStrategies } from '../../../src/assignment/strategies/index.js'
import { InMemoryStore } from '../../helpers/in-memory-store.js'

describe('findReplacementCandidates', () => {
  let store: InMemoryStore

  beforeEach(() => {
    store = new InMemoryStore()
  })

  async function search(prId: string, replacedId: string) {
    const users = store.repositories.users
    const pr = await store.repositories.pullRequests.get(prId)
    const replaced = await users.get(replacedId)
    const context = createSearchContext(pr, pr.assignedReviewers, replaced, users)
    return findReplacementCandidates(defaultCandidateStrategies(), context)
  }

  it('debe usar el equipo del reviewer si tiene candidatos', async () => {
    store
      .seedTeam('backend', [['b1', true], ['b2', true], ['b3', true]])
      .seedTeam('frontend', [['author', true], ['f1', true]])
      .seedPullRequest({ id: 'pr1', authorId: 'author', reviewers: ['b1', 'b2'] })

    const result = await search('pr1', 'b1')

    expect(result).toEqual({ tier: 'reviewer-team', candidates: ['b3'] })
  })

  it('no debe buscar al autor si el primer tier tiene candidatos', async () => {
    store
      .seedTeam('backend', [['b1', true], ['b2', true]])
      .seedTeam('frontend', [['author', true]])
      .seedPullRequest({ id: 'pr1', authorId: 'author', reviewers: ['b1'] })
    const users = store.repositories.users
    const pr = await store.repositories.pullRequests.get('pr1')
    const replaced = await users.get('b1')
    const getSpy = vi.spyOn(users, 'get')

    const context = createSearchContext(pr, pr.assignedReviewers, replaced, users)
    const result = await findReplacementCandidates(defaultCandidateStrategies(), context)

    expect(result?.tier).toBe('reviewer-team')
    expect(getSpy).not.toHaveBeenCalled()
  })

  it('debe preferir el equipo del autor antes que otros equipos', async () => {
    store
      .seedTeam('backend', [['b1', true], ['b2', false]])
      .seedTeam('frontend', [['author', true], ['f1', true], ['f2', true]])
      .seedTeam('design', [['d1', true]])
      .seedPullRequest({ id: 'pr1', authorId: 'author', reviewers: ['b1'] })
    const excludingSpy = vi.spyOn(store.repositories.users, 'getActiveExcludingTeams')

    const result = await search('pr1', 'b1')

    expect(result).toEqual({ tier: 'author-team', candidates: ['f1', 'f2'] })
    expect(excludingSpy).not.toHaveBeenCalled()
  })

  it('debe saltar el tier del autor si comparte equipo con el reviewer', async () => {
    store
      .seedTeam('backend', [['author', true], ['b1', true], ['b2', true]])
      .seedTeam('frontend', [['f1', true], ['f2', false]])
      .seedPullRequest({ id: 'pr1', authorId: 'author', reviewers: ['b1', 'b2'] })
    const excludingSpy = vi.spyOn(store.repositories.users, 'getActiveExcludingTeams')

    const result = await search('pr1', 'b1')

    expect(result).toEqual({ tier: 'other-teams', candidates: ['f1'] })
    expect(excludingSpy).toHaveBeenCalledWith(['backend'])
  })

  it('debe excluir de otros equipos a los dos equipos ya recorridos', async () => {
    store
      .seedTeam('backend', [['b1', true]])
      .seedTeam('frontend', [['author', true]])
      .seedTeam('design', [['d1', true]])
      .seedPullRequest({ id: 'pr1', authorId: 'author', reviewers: ['b1'] })
    const excludingSpy = vi.spyOn(store.repositories.users, 'getActiveExcludingTeams')

    const result = await search('pr1', 'b1')

    expect(result).toEqual({ tier: 'other-teams', candidates: ['d1'] })
    expect(excludingSpy).toHaveBeenCalledWith(['backend', 'frontend'])
  })

  it('debe retornar null si ningún tier tiene candidatos', async () => {
    store
      .seedTeam('backend', [['author', true], ['b1', true]])
      .seedPullRequest({ id: 'pr1', authorId: 'author', reviewers: ['b1'] })

    expect(await search('pr1', 'b1')).toBeNull()
  })

  it('debe excluir a los reviewers actuales en todos los tiers', async () => {
    store
      .seedTeam('backend', [['b1', true]])
      .seedTeam('frontend', [['author', true], ['f1', true]])
      .seedPullRequest({ id: 'pr1', authorId: 'author', reviewers: ['b1', 'f1'] })

    expect(await search('pr1', 'b1')).toBeNull()
  })

  it('debe propagar errores del store', async () => {
    store
      .seedTeam('backend', [['b1', true]])
      .seedTeam('frontend', [['author', true]])
      .seedPullRequest({ id: 'pr1', authorId: 'author', reviewers: ['b1'] })
    vi.spyOn(store.repositories.users, 'getByTeam').mockRejectedValueOnce(new Error('connection reset'))

    await expect(search('pr1', 'b1')).rejects.toThrow('connection reset')
  })
})
