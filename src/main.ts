import * as core from '@actions/core'
import * as github from '@actions/github'
import { type ActionConfig, loadConfig } from './config.js'
import { checkPullRequestForConflicts } from './useCases/pullRequestConflictChecker.js'
import { resolveConflictPalette } from './useCases/conflictPalette.js'
import { createPullRequestRepository } from './infrastructures/pullRequestRepository.js'
import { createFileContentRepository } from './infrastructures/fileContentRepository.js'
import { createActionOutputAdapter } from './infrastructures/actionOutputAdapter.js'
import { createInputColorResolver } from './infrastructures/inputColorResolver.js'
import { createAnnotationRenderer } from './infrastructures/annotationRenderer.js'
import { createSummaryRenderer } from './infrastructures/summaryRenderer.js'
import { combineRenderers } from './infrastructures/regionBuffer.js'

/**
 * GitHub Action main entry point
 *
 * @returns Resolves when the action is complete.
 */
export async function run(): Promise<void> {
  const outputAdapter = createActionOutputAdapter()

  let config: ActionConfig
  try {
    config = loadConfig()
  } catch (error) {
    outputAdapter.reportFailure(
      error instanceof Error ? error.message : String(error)
    )
    return
  }

  const octokit = github.getOctokit(config.token)

  const palette = resolveConflictPalette(
    createInputColorResolver(config.highlightColors),
    config.highlightGroups,
    config.labelShade
  )
  core.debug(`Resolved conflict palette: ${JSON.stringify(palette)}`)

  await checkPullRequestForConflicts({
    pullRequestRepository: createPullRequestRepository(octokit),
    fileContentRepository: createFileContentRepository(octokit),
    renderer: combineRenderers(
      createAnnotationRenderer(),
      createSummaryRenderer(palette)
    ),
    output: outputAdapter,
    excludePatterns: config.excludePatterns,
    failOnConflict: config.failOnConflict
  })
}
