import * as core from '@actions/core'
import {
  type HighlightGroups,
  DEFAULT_HIGHLIGHT_GROUPS
} from './domains/conflictPalette.js'
import { DEFAULT_SHADE_AMOUNT } from './domains/packedColor.js'

/**
 * Action inputs after defaults and validation
 */
export type ActionConfig = {
  readonly token: string
  readonly excludePatterns: string[]
  readonly failOnConflict: boolean
  readonly highlightGroups: HighlightGroups
  readonly highlightColors: string[]
  readonly labelShade: number
}

const splitList = (value: string, separator: RegExp): string[] =>
  value
    .split(separator)
    .map((item) => item.trim())
    .filter((item) => item.length > 0)

export const parseLabelShade = (value: string): number => {
  if (value.trim() === '') {
    return DEFAULT_SHADE_AMOUNT
  }
  const amount = Number(value)
  if (!Number.isInteger(amount) || amount < 0 || amount > 100) {
    throw new Error(
      `label-shade must be an integer between 0 and 100, got "${value}"`
    )
  }
  return amount
}

/**
 * Read the action inputs
 */
export const loadConfig = (): ActionConfig => ({
  token: core.getInput('github-token', { required: true }),
  excludePatterns: splitList(core.getInput('exclude-patterns'), /,/),
  failOnConflict: core.getInput('fail-on-conflict').trim() !== 'false',
  highlightGroups: {
    current:
      core.getInput('current-highlight') || DEFAULT_HIGHLIGHT_GROUPS.current,
    incoming:
      core.getInput('incoming-highlight') || DEFAULT_HIGHLIGHT_GROUPS.incoming,
    ancestor:
      core.getInput('ancestor-highlight') || DEFAULT_HIGHLIGHT_GROUPS.ancestor
  },
  highlightColors: splitList(core.getInput('highlight-colors'), /[\n,]/),
  labelShade: parseLabelShade(core.getInput('label-shade'))
})
