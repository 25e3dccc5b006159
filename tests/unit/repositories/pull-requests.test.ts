import { describe, it, expect, vi, beforeEach } from 'vitest'
import type { Database } from '../../../src/db/client.js'
import { DrizzlePullRequestRepository } from '../../../src/repositories/pull-requests.js'
import type { PullRequest } from '../../../src/domain/models.js'

function pgError(code: string): Error {
  return Object.assign(new Error('query failed'), { code })
}

const pr: PullRequest = {
  pullRequestId: 'pr1',
  pullRequestName: 'Add search',
  authorId: 'u1',
  status: 'OPEN',
  assignedReviewers: [],
  createdAt: new Date('2024-01-01T00:00:00.000Z'),
  mergedAt: null,
}

describe('DrizzlePullRequestRepository', () => {
  let mockDb: {
    insert: ReturnType<typeof vi.fn>
    delete: ReturnType<typeof vi.fn>
    transaction: ReturnType<typeof vi.fn>
  }
  let repository: DrizzlePullRequestRepository

  function deleteReturning(rows: unknown[]) {
    return vi.fn(() => ({
      where: vi.fn(() => ({
        returning: vi.fn().mockResolvedValue(rows),
      })),
    }))
  }

  beforeEach(() => {
    mockDb = { insert: vi.fn(), delete: vi.fn(), transaction: vi.fn() }
    repository = new DrizzlePullRequestRepository(mockDb as unknown as Database)
  })

  describe('create', () => {
    it('debe mapear unique violation a PR_EXISTS', async () => {
      mockDb.insert = vi.fn(() => ({ values: vi.fn().mockRejectedValue(pgError('23505')) }))

      await expect(repository.create(pr)).rejects.toMatchObject({ code: 'PR_EXISTS' })
    })

    it('debe mapear foreign key violation envuelta en cause a NOT_FOUND', async () => {
      mockDb.insert = vi.fn(() => ({
        values: vi.fn().mockRejectedValue(new Error('insert failed', { cause: pgError('23503') })),
      }))

      await expect(repository.create(pr)).rejects.toMatchObject({
        code: 'NOT_FOUND',
        message: 'author u1 not found',
      })
    })

    it('debe propagar otros errores sin traducirlos', async () => {
      mockDb.insert = vi.fn(() => ({ values: vi.fn().mockRejectedValue(new Error('connection reset')) }))

      await expect(repository.create(pr)).rejects.toThrow('connection reset')
    })
  })

  it('no debe insertar si no hay reviewers', async () => {
    await repository.assignReviewers('pr1', [])

    expect(mockDb.insert).not.toHaveBeenCalled()
  })

  it('debe fallar con NOT_ASSIGNED al quitar un reviewer no asignado', async () => {
    mockDb.delete = deleteReturning([])

    await expect(repository.removeReviewer('pr1', 'u9')).rejects.toMatchObject({ code: 'NOT_ASSIGNED' })
  })

  describe('reassignReviewer', () => {
    it('debe borrar e insertar dentro de la transacción', async () => {
      const values = vi.fn().mockResolvedValue(undefined)
      const tx = { delete: deleteReturning([{ userId: 'u2' }]), insert: vi.fn(() => ({ values })) }
      mockDb.transaction = vi.fn(async (fn: (tx: unknown) => Promise<void>) => fn(tx))

      await repository.reassignReviewer('pr1', 'u2', 'u3')

      expect(values).toHaveBeenCalledWith({ pullRequestId: 'pr1', userId: 'u3' })
    })

    it('debe fallar con NOT_ASSIGNED sin insertar si el reviewer no estaba', async () => {
      const tx = { delete: deleteReturning([]), insert: vi.fn() }
      mockDb.transaction = vi.fn(async (fn: (tx: unknown) => Promise<void>) => fn(tx))

      await expect(repository.reassignReviewer('pr1', 'u2', 'u3')).rejects.toMatchObject({
        code: 'NOT_ASSIGNED',
      })
      expect(tx.insert).not.toHaveBeenCalled()
    })
  })
})
