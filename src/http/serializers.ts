import type { PullRequest, PullRequestShort, Team, User } from '../domain/models.js'

export function serializePullRequest(pr: PullRequest) {
  return {
    pull_request_id: pr.pullRequestId,
    pull_request_name: pr.pullRequestName,
    author_id: pr.authorId,
    status: pr.status,
    assigned_reviewers: pr.assignedReviewers,
    ...(pr.createdAt ? { createdAt: pr.createdAt.toISOString() } : {}),
    ...(pr.mergedAt ? { mergedAt: pr.mergedAt.toISOString() } : {}),
  }
}

export function serializePullRequestShort(pr: PullRequestShort) {
  return {
    pull_request_id: pr.pullRequestId,
    pull_request_name: pr.pullRequestName,
    author_id: pr.authorId,
    status: pr.status,
  }
}

export function serializeTeam(team: Team) {
  return {
    team_name: team.teamName,
    members: team.members.map(member => ({
      user_id: member.userId,
      username: member.username,
      is_active: member.isActive,
    })),
  }
}

export function serializeUser(user: User) {
  return {
    user_id: user.userId,
    username: user.username,
    team_name: user.teamName,
    is_active: user.isActive,
  }
}
