import * as core from '@actions/core'
import type { OutputPort } from '../domains/outputPort.js'

const OUTPUT_CONFLICTS = 'conflicts'
const OUTPUT_CONFLICTED_FILES = 'conflicted-files'
const OUTPUT_CONFLICT_COUNT = 'conflict-count'

/**
 * GitHub Actions output adapter
 */
export const createActionOutputAdapter = (): OutputPort => ({
  setConflictsFound: (found: boolean): void => {
    core.setOutput(OUTPUT_CONFLICTS, found.toString())
  },
  setConflictedFiles: (files: string[]): void => {
    core.setOutput(OUTPUT_CONFLICTED_FILES, files.join(','))
  },
  setConflictCount: (count: number): void => {
    core.setOutput(OUTPUT_CONFLICT_COUNT, count.toString())
  },
  reportFailure: (message: string): void => {
    core.setFailed(message)
  },
  reportWarning: (message: string): void => {
    core.warning(message)
  }
})
