import type { FastifyReply, FastifyRequest } from 'fastify'
import { z } from 'zod'
import { sendError } from '../errors.js'
import { serializePullRequest } from '../serializers.js'
import type { AppServices } from '../types.js'

const CreatePullRequestBodySchema = z.object({
  pull_request_id: z.string().min(1),
  pull_request_name: z.string().min(1),
  author_id: z.string().min(1),
})

const MergePullRequestBodySchema = z.object({
  pull_request_id: z.string().min(1),
})

const ReassignReviewerBodySchema = z.object({
  pull_request_id: z.string().min(1),
  old_user_id: z.string().min(1),
})

export async function handleCreatePullRequest(
  request: FastifyRequest,
  reply: FastifyReply,
  services: AppServices
) {
  try {
    const body = CreatePullRequestBodySchema.parse(request.body)
    const pr = await services.assignment.createPullRequest(
      body.pull_request_id,
      body.pull_request_name,
      body.author_id
    )

    return reply.code(201).send({ pr: serializePullRequest(pr) })
  } catch (error) {
    return sendError(reply, error)
  }
}

export async function handleMergePullRequest(
  request: FastifyRequest,
  reply: FastifyReply,
  services: AppServices
) {
  try {
    const body = MergePullRequestBodySchema.parse(request.body)
    const pr = await services.assignment.mergePullRequest(body.pull_request_id)

    return reply.code(200).send({ pr: serializePullRequest(pr) })
  } catch (error) {
    return sendError(reply, error)
  }
}

export async function handleReassignReviewer(
  request: FastifyRequest,
  reply: FastifyReply,
  services: AppServices
) {
  try {
    const body = ReassignReviewerBodySchema.parse(request.body)
    const result = await services.assignment.reassignReviewer(
      body.pull_request_id,
      body.old_user_id
    )

    return reply.code(200).send({
      pr: serializePullRequest(result.pr),
      replaced_by: result.replacedBy,
    })
  } catch (error) {
    return sendError(reply, error)
  }
}
