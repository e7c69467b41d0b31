/**
 * This file is used to mock the `@actions/github` module in tests.
 */
import { jest } from '@jest/globals'

export type PullRequestPayload = {
  pull_request?: { number: number; head: { sha: string } }
}

export const context: {
  repo: { owner: string; repo: string }
  payload: PullRequestPayload
} = {
  repo: { owner: 'test-owner', repo: 'test-repo' },
  payload: {}
}

export const getOctokit = jest.fn<(token: string) => unknown>()
