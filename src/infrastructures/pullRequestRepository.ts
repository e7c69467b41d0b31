import * as core from '@actions/core'
import * as github from '@actions/github'
import type { PullRequestRepositoryPort } from '../domains/pullRequestRepositoryPort.js'
import { type PullRequest, createPullRequest } from '../domains/pullRequest.js'
import { type File, createFile } from '../domains/file.js'
import { fileStatusFromString } from '../domains/fileStatus.js'
import { wait } from '../wait.js'

const FILES_PER_PAGE = 100
const MAX_RETRIES = 3
const LOW_RATE_LIMIT = 100
const DEFAULT_RATE_LIMIT_WAIT_MS = 60000

type Octokit = ReturnType<typeof github.getOctokit>

/**
 * Pull request repository implementation using GitHub API
 */
export const createPullRequestRepository = (
  octokit: Octokit
): PullRequestRepositoryPort => ({
  getCurrentPullRequest: (): PullRequest => {
    const { payload, repo } = github.context

    if (!payload.pull_request) {
      throw new Error('This action can only be run on pull requests')
    }

    return createPullRequest(
      repo.owner,
      repo.repo,
      payload.pull_request.number,
      payload.pull_request.head.sha
    )
  },

  getFiles: async (pullRequest: PullRequest): Promise<File[]> => {
    const files: File[] = []
    let page = 1
    let retries = 0

    for (;;) {
      let pageFiles: File[]
      try {
        pageFiles = await fetchFilesPage(octokit, pullRequest, page)
      } catch (error: unknown) {
        if (retries >= MAX_RETRIES) {
          throw new Error(
            `GitHub API request failed after ${MAX_RETRIES} retries: ${String(error)}`
          )
        }
        await wait(getWaitTime(error))
        retries++
        continue
      }

      files.push(...pageFiles)
      if (pageFiles.length < FILES_PER_PAGE) {
        return files
      }

      core.info(`Fetched ${files.length} files so far...`)
      page++
      retries = 0
    }
  }
})

const fetchFilesPage = async (
  octokit: Octokit,
  pullRequest: PullRequest,
  page: number
): Promise<File[]> => {
  const response = await octokit.rest.pulls.listFiles({
    owner: pullRequest.owner,
    repo: pullRequest.repo,
    pull_number: pullRequest.number,
    per_page: FILES_PER_PAGE,
    page
  })

  const remaining = Number(response.headers['x-ratelimit-remaining'] ?? 0)
  const reset = Number(response.headers['x-ratelimit-reset'] ?? 0)
  if (remaining < LOW_RATE_LIMIT) {
    core.warning(
      `Low API rate limit: ${remaining} requests remaining. Reset at ${new Date(reset * 1000).toISOString()}`
    )
  }

  return response.data.map((fileData) =>
    createFile(
      fileData.filename,
      fileStatusFromString(fileData.status),
      fileData.patch
    )
  )
}

/**
 * Read a header from the response attached to an Octokit request error
 */
const readResponseHeader = (
  error: object,
  name: string
): string | undefined => {
  const response: unknown = 'response' in error ? error.response : undefined
  if (
    typeof response !== 'object' ||
    response === null ||
    !('headers' in response)
  ) {
    return undefined
  }
  const { headers } = response
  if (typeof headers !== 'object' || headers === null) {
    return undefined
  }
  const value: unknown = Reflect.get(headers, name)
  return typeof value === 'string' ? value : undefined
}

/**
 * Get wait time for rate limit errors from GitHub API; rethrows anything else
 */
const getWaitTime = (error: unknown): number => {
  if (
    typeof error !== 'object' ||
    error === null ||
    !('status' in error) ||
    (error.status !== 403 && error.status !== 429)
  ) {
    throw error
  }

  const retryAfter = readResponseHeader(error, 'retry-after')
  const resetTime = readResponseHeader(error, 'x-ratelimit-reset')

  let waitTime = DEFAULT_RATE_LIMIT_WAIT_MS
  if (retryAfter) {
    waitTime = parseInt(retryAfter) * 1000
  } else if (resetTime) {
    waitTime = Math.max(parseInt(resetTime) * 1000 - Date.now(), 1000)
  }

  core.warning(`Rate limited. Waiting ${waitTime / 1000} seconds before retry...`)
  return waitTime
}
