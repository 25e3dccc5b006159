export type ErrorCode =
  | 'TEAM_EXISTS'
  | 'PR_EXISTS'
  | 'PR_MERGED'
  | 'NOT_ASSIGNED'
  | 'NO_CANDIDATE'
  | 'NOT_FOUND'
  | 'INVALID_INPUT'

const DEFAULT_MESSAGES: Record<ErrorCode, string> = {
  TEAM_EXISTS: 'team already exists',
  PR_EXISTS: 'pull request already exists',
  PR_MERGED: 'cannot modify merged pull request',
  NOT_ASSIGNED: 'reviewer is not assigned to this PR',
  NO_CANDIDATE: 'no active replacement candidate in team',
  NOT_FOUND: 'resource not found',
  INVALID_INPUT: 'invalid input data',
}

/**
 * Error de negocio con código de API
 * Cualquier otro error se considera un fallo interno (store, red, etc.)
 */
export class DomainError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message?: string) {
    super(message ?? DEFAULT_MESSAGES[code])
    this.name = 'DomainError'
    this.code = code
  }
}

export function isDomainError(error: unknown, code?: ErrorCode): error is DomainError {
  return error instanceof DomainError && (code === undefined || error.code === code)
}

export const errors = {
  teamExists: () => new DomainError('TEAM_EXISTS'),
  prExists: () => new DomainError('PR_EXISTS'),
  prMerged: () => new DomainError('PR_MERGED'),
  notAssigned: () => new DomainError('NOT_ASSIGNED'),
  noCandidate: () => new DomainError('NO_CANDIDATE'),
  notFound: (message?: string) => new DomainError('NOT_FOUND', message),
}
