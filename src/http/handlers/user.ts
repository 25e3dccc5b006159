import type { FastifyReply, FastifyRequest } from 'fastify'
import { z } from 'zod'
import { sendError } from '../errors.js'
import { serializePullRequestShort, serializeUser } from '../serializers.js'
import type { AppServices } from '../types.js'

const SetIsActiveBodySchema = z.object({
  user_id: z.string().min(1),
  is_active: z.boolean(),
})

const UserQuerySchema = z.object({
  user_id: z.string().min(1),
})

export async function handleSetIsActive(
  request: FastifyRequest,
  reply: FastifyReply,
  services: AppServices
) {
  try {
    const body = SetIsActiveBodySchema.parse(request.body)
    const user = await services.deactivation.setIsActive(body.user_id, body.is_active)

    return reply.code(200).send({ user: serializeUser(user) })
  } catch (error) {
    return sendError(reply, error)
  }
}

export async function handleGetReview(
  request: FastifyRequest,
  reply: FastifyReply,
  services: AppServices
) {
  try {
    const query = UserQuerySchema.parse(request.query)
    const reviews = await services.assignment.getUserReviews(query.user_id)

    return reply.code(200).send({
      user_id: reviews.userId,
      pull_requests: reviews.pullRequests.map(serializePullRequestShort),
    })
  } catch (error) {
    return sendError(reply, error)
  }
}
