import * as core from '@actions/core'
import type {
  FileContentRepositoryPort,
  PullRequestRepositoryPort
} from '../domains/pullRequestRepositoryPort.js'
import type { OutputPort } from '../domains/outputPort.js'
import type { RendererPort } from '../domains/rendererPort.js'
import type { File } from '../domains/file.js'
import { isFileRemoved } from '../domains/fileStatus.js'
import { createPullRequestLineSource } from '../infrastructures/pullRequestLineSource.js'
import { createConflictHighlighter } from './conflictHighlighter.js'
import { hasConflictMarkersInPatch } from './fileConflictChecker.js'

/**
 * Check pull request for conflict blocks and render them
 */
export const checkPullRequestForConflicts = async (dependencies: {
  pullRequestRepository: PullRequestRepositoryPort
  fileContentRepository: FileContentRepositoryPort
  renderer: RendererPort
  output: OutputPort
  excludePatterns: string[]
  failOnConflict: boolean
}): Promise<void> => {
  const {
    pullRequestRepository,
    fileContentRepository,
    renderer,
    output,
    excludePatterns,
    failOnConflict
  } = dependencies

  try {
    const pullRequest = pullRequestRepository.getCurrentPullRequest()
    core.info(`Checking PR ${pullRequest.identifier} for conflict markers...`)

    const files = await pullRequestRepository.getFiles(pullRequest)
    core.info(`Total files to check: ${files.length}`)

    const highlighter = createConflictHighlighter({
      lineSource: createPullRequestLineSource(
        fileContentRepository,
        pullRequest
      ),
      renderer
    })

    const conflictedFiles: string[] = []
    let blockCount = 0

    for (const file of files) {
      if (!shouldCheckFile(file, excludePatterns)) {
        core.info(`Skipping ${file.fileName}`)
        continue
      }

      if (file.patch !== undefined && !hasConflictMarkersInPatch(file.patch)) {
        core.debug(`No conflict markers added in ${file.fileName}`)
        continue
      }

      if (file.patch === undefined) {
        core.info(
          `Patch not available for ${file.fileName}, fetching full content...`
        )
      }

      const blocks = await highlighter.refresh(file.fileName)
      if (!blocks) {
        core.warning(`Could not fetch content for ${file.fileName}`)
        continue
      }

      const checkedFile = file.withConflicts(blocks)
      if (!checkedFile.hasConflicts()) {
        if (file.patch !== undefined) {
          core.warning(
            `Stray conflict markers in ${file.fileName} do not form a complete block`
          )
        }
        continue
      }

      conflictedFiles.push(file.fileName)
      blockCount += checkedFile.conflicts.length

      for (const block of checkedFile.conflicts) {
        const startLine = block.markers.startLine + 1
        const endLine = block.markers.finishLine + 1
        core.error(
          `Conflict block found in ${file.fileName} at lines ${startLine}-${endLine}`,
          { title: 'Conflict block', file: file.fileName, startLine, endLine }
        )
      }
    }

    await renderer.flush()

    output.setConflictsFound(conflictedFiles.length > 0)
    output.setConflictedFiles(conflictedFiles)
    output.setConflictCount(blockCount)

    if (conflictedFiles.length === 0) {
      core.info('No conflict markers found!')
      return
    }

    const message = `Found ${blockCount} conflict block(s) in ${conflictedFiles.length} file(s)`
    if (failOnConflict) {
      output.reportFailure(message)
    } else {
      output.reportWarning(message)
    }
  } catch (error) {
    const message =
      error instanceof Error ? error.message : 'An unknown error occurred'
    output.reportFailure(message)
  }
}

/**
 * Check if a file should be checked for conflicts
 */
const shouldCheckFile = (file: File, excludePatterns: string[]): boolean => {
  if (isFileRemoved(file.status)) {
    return false
  }

  return !excludePatterns.some((pattern) => file.fileName.includes(pattern))
}
