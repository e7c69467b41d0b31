import type { PullRequest } from './pullRequest.js'
import type { File } from './file.js'

export type PullRequestRepositoryPort = {
  /**
   * Get pull request information from current context
   */
  getCurrentPullRequest(): PullRequest

  /**
   * Fetch every file changed by the pull request
   */
  getFiles(pullRequest: PullRequest): Promise<File[]>
}

export type FileContentRepositoryPort = {
  /**
   * Fetch a file at the pull request head. Resolves to null when unavailable.
   */
  getFileContent(pullRequest: PullRequest, path: string): Promise<string | null>
}
