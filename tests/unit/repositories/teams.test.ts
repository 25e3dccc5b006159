import { describe, it, expect, vi } from 'vitest'
import type { Database } from '../../../src/db/client.js'
import { DrizzleTeamRepository } from '../../../src/repositories/teams.js'

describe('DrizzleTeamRepository', () => {
  it('debe mapear unique violation a TEAM_EXISTS', async () => {
    const mockDb = {
      transaction: vi.fn().mockRejectedValue(Object.assign(new Error('duplicate key'), { code: '23505' })),
    }
    const repository = new DrizzleTeamRepository(mockDb as unknown as Database)

    await expect(
      repository.create({ teamName: 'backend', members: [] })
    ).rejects.toMatchObject({ code: 'TEAM_EXISTS' })
  })

  it('debe fallar con NOT_FOUND si el equipo no existe', async () => {
    const mockDb = {
      select: vi.fn(() => ({
        from: vi.fn(() => ({
          where: vi.fn(() => ({
            limit: vi.fn().mockResolvedValue([]),
          })),
        })),
      })),
    }
    const repository = new DrizzleTeamRepository(mockDb as unknown as Database)

    await expect(repository.get('ghost')).rejects.toMatchObject({
      code: 'NOT_FOUND',
      message: 'team ghost not found',
    })
  })
})
