export type PullRequestStatus = 'OPEN' | 'MERGED'

export interface User {
  userId: string
  username: string
  teamName: string
  isActive: boolean
}

export interface TeamMember {
  userId: string
  username: string
  isActive: boolean
}

export interface Team {
  teamName: string
  members: TeamMember[]
}

export interface PullRequest {
  pullRequestId: string
  pullRequestName: string
  authorId: string
  status: PullRequestStatus
  /** Ordenados por momento de asignación */
  assignedReviewers: string[]
  createdAt: Date | null
  mergedAt: Date | null
}

export interface PullRequestShort {
  pullRequestId: string
  pullRequestName: string
  authorId: string
  status: PullRequestStatus
}

export interface UserPullRequests {
  userId: string
  pullRequests: PullRequestShort[]
}

export interface UserAssignmentStats {
  userId: string
  username: string
  totalAssignments: number
  openPrs: number
  mergedPrs: number
}

export interface PullRequestStats {
  total: number
  open: number
  merged: number
  avgReviewers: number
}
