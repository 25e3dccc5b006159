import type { FastifyReply, FastifyRequest } from 'fastify'
import { z } from 'zod'
import { sendError } from '../errors.js'
import { serializeTeam } from '../serializers.js'
import type { AppServices } from '../types.js'

const CreateTeamBodySchema = z.object({
  team_name: z.string().min(1),
  members: z.array(
    z.object({
      user_id: z.string().min(1),
      username: z.string().min(1),
      is_active: z.boolean(),
    })
  ),
})

const TeamQuerySchema = z.object({
  team_name: z.string().min(1),
})

const DeactivateTeamBodySchema = z.object({
  team_name: z.string().min(1),
})

export async function handleCreateTeam(
  request: FastifyRequest,
  reply: FastifyReply,
  services: AppServices
) {
  try {
    const body = CreateTeamBodySchema.parse(request.body)
    const team = await services.teams.createTeam({
      teamName: body.team_name,
      members: body.members.map(member => ({
        userId: member.user_id,
        username: member.username,
        isActive: member.is_active,
      })),
    })

    return reply.code(201).send({ team: serializeTeam(team) })
  } catch (error) {
    return sendError(reply, error)
  }
}

export async function handleGetTeam(
  request: FastifyRequest,
  reply: FastifyReply,
  services: AppServices
) {
  try {
    const query = TeamQuerySchema.parse(request.query)
    const team = await services.teams.getTeam(query.team_name)

    return reply.code(200).send(serializeTeam(team))
  } catch (error) {
    return sendError(reply, error)
  }
}

/**
 * Desactivación masiva del equipo
 * Si el cliente se desconecta, el loop de reasignación se detiene
 */
export async function handleDeactivateTeam(
  request: FastifyRequest,
  reply: FastifyReply,
  services: AppServices
) {
  const controller = new AbortController()
  const onClose = () => {
    if (!reply.raw.writableEnded) {
      controller.abort()
    }
  }
  reply.raw.on('close', onClose)

  try {
    const body = DeactivateTeamBodySchema.parse(request.body)
    const result = await services.deactivation.bulkDeactivateTeam(body.team_name, {
      signal: controller.signal,
    })

    return reply.code(200).send({
      deactivated_users: result.deactivatedUsers,
      reassigned_prs: result.reassignedPrs,
      errors: result.errors,
    })
  } catch (error) {
    return sendError(reply, error)
  } finally {
    reply.raw.off('close', onClose)
  }
}
