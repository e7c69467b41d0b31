import type { LineSourcePort } from '../domains/lineSourcePort.js'
import type { PullRequest } from '../domains/pullRequest.js'
import type { FileContentRepositoryPort } from '../domains/pullRequestRepositoryPort.js'
import { splitLines } from '../useCases/fileConflictChecker.js'

/**
 * Line source reading files at the pull request head; source ids are paths
 */
export const createPullRequestLineSource = (
  fileContentRepository: FileContentRepositoryPort,
  pullRequest: PullRequest
): LineSourcePort => ({
  snapshot: async (path: string): Promise<readonly string[] | null> => {
    const content = await fileContentRepository.getFileContent(
      pullRequest,
      path
    )
    return content === null ? null : splitLines(content)
  }
})
