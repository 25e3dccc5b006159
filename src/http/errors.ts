import type { FastifyReply } from 'fastify'
import { ZodError } from 'zod'
import { DomainError, type ErrorCode } from '../domain/errors.js'
import { logger } from '../utils/logger.js'

export type ApiErrorCode = ErrorCode | 'INTERNAL'

export interface ErrorResponse {
  error: {
    code: ApiErrorCode
    message: string
  }
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  TEAM_EXISTS: 400,
  INVALID_INPUT: 400,
  PR_EXISTS: 409,
  PR_MERGED: 409,
  NOT_ASSIGNED: 409,
  NO_CANDIDATE: 409,
  NOT_FOUND: 404,
}

export function toHttpError(error: unknown): { statusCode: number; body: ErrorResponse } {
  if (error instanceof DomainError) {
    return {
      statusCode: STATUS_BY_CODE[error.code],
      body: { error: { code: error.code, message: error.message } },
    }
  }

  if (error instanceof ZodError) {
    const message = error.issues
      .map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ')
    return {
      statusCode: 400,
      body: { error: { code: 'INVALID_INPUT', message } },
    }
  }

  // Fallos del store u otros: no exponemos el detalle
  return {
    statusCode: 500,
    body: { error: { code: 'INTERNAL', message: 'Internal server error' } },
  }
}

export function sendError(reply: FastifyReply, error: unknown): FastifyReply {
  const { statusCode, body } = toHttpError(error)

  if (statusCode >= 500) {
    logger.error({ error, url: reply.request.url }, 'Request failed')
  } else {
    logger.warn({ code: body.error.code, message: body.error.message, url: reply.request.url }, 'Request rejected')
  }

  return reply.code(statusCode).send(body)
}
