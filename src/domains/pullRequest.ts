/**
 * The pull request being checked
 */
export type PullRequest = {
  readonly owner: string
  readonly repo: string
  readonly number: number
  readonly headSha: string
  readonly identifier: string
}

export const createPullRequest = (
  owner: string,
  repo: string,
  number: number,
  headSha: string
): PullRequest => ({
  owner,
  repo,
  number,
  headSha,
  identifier: `${owner}/${repo}#${number}`
})
