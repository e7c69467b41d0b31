/**
 * Unit tests for src/config.ts
 */
import { jest } from '@jest/globals'
import * as core from '../__fixtures__/core.js'
import { loadConfig, parseLabelShade } from '../src/config.js'

jest.mock('@actions/core', () => jest.requireActual('../__fixtures__/core.js'))

const withInputs = (inputs: Record<string, string>): void => {
  core.getInput.mockImplementation((name) => inputs[name] ?? '')
}

describe('loadConfig', () => {
  it('Applies defaults', () => {
    withInputs({ 'github-token': 'test-token' })

    expect(loadConfig()).toEqual({
      token: 'test-token',
      excludePatterns: [],
      failOnConflict: true,
      highlightGroups: {
        current: 'DiffText',
        incoming: 'DiffAdd',
        ancestor: 'DiffChange'
      },
      highlightColors: [],
      labelShade: 60
    })
  })

  it('Reads every input', () => {
    withInputs({
      'github-token': 'test-token',
      'exclude-patterns': 'vendor/, fixtures/ ,',
      'fail-on-conflict': 'false',
      'current-highlight': 'Ours',
      'ancestor-highlight': 'Base',
      'highlight-colors': 'Ours=#112233\nBase=#445566, DiffAdd=#778899',
      'label-shade': '25'
    })

    expect(loadConfig()).toEqual({
      token: 'test-token',
      excludePatterns: ['vendor/', 'fixtures/'],
      failOnConflict: false,
      highlightGroups: {
        current: 'Ours',
        incoming: 'DiffAdd',
        ancestor: 'Base'
      },
      highlightColors: ['Ours=#112233', 'Base=#445566', 'DiffAdd=#778899'],
      labelShade: 25
    })
  })
})

describe('parseLabelShade', () => {
  it('Accepts integers from 0 to 100', () => {
    expect(parseLabelShade('')).toBe(60)
    expect(parseLabelShade('0')).toBe(0)
    expect(parseLabelShade('100')).toBe(100)
  })

  it('Rejects other values', () => {
    expect(() => parseLabelShade('101')).toThrow(
      'label-shade must be an integer between 0 and 100, got "101"'
    )
    expect(() => parseLabelShade('4.5')).toThrow('label-shade')
    expect(() => parseLabelShade('dark')).toThrow('label-shade')
  })
})
