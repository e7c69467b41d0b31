import * as core from '@actions/core'
import type * as github from '@actions/github'
import type { PullRequest } from '../domains/pullRequest.js'
import type { FileContentRepositoryPort } from '../domains/pullRequestRepositoryPort.js'

/**
 * File content repository implementation using GitHub API
 */
export const createFileContentRepository = (
  octokit: ReturnType<typeof github.getOctokit>
): FileContentRepositoryPort => ({
  getFileContent: async (
    pullRequest: PullRequest,
    path: string
  ): Promise<string | null> => {
    try {
      const { data } = await octokit.rest.repos.getContent({
        owner: pullRequest.owner,
        repo: pullRequest.repo,
        path,
        ref: pullRequest.headSha
      })

      // Directories come back as arrays, symlinks and submodules without content
      if (Array.isArray(data) || !('content' in data)) {
        return null
      }
      if (typeof data.content !== 'string') {
        return null
      }

      return Buffer.from(data.content, 'base64').toString('utf8')
    } catch (error) {
      core.warning(`Could not read ${path}: ${String(error)}`)
      return null
    }
  }
})
