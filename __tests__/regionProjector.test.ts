/**
 * Unit tests for src/useCases/regionProjector.ts
 */
import { createSection } from '../src/domains/conflictBlock.js'
import { parseConflictBlocks } from '../src/useCases/conflictBlockParser.js'
import {
  formatLabel,
  projectRegions
} from '../src/useCases/regionProjector.js'

const project = (lines: string[]) =>
  projectRegions(lines, parseConflictBlocks(lines))

describe('projectRegions', () => {
  it('Projects current and incoming regions', () => {
    const lines = ['a', '<<<<<<<', 'x', '=======', 'y', '>>>>>>>', 'b']

    expect(project(lines)).toEqual([
      {
        kind: 'current',
        paintRange: { start: 1, end: 2 },
        labelText: 'x (Current)',
        labelLine: 1
      },
      {
        kind: 'incoming',
        paintRange: { start: 4, end: 5 },
        labelText: 'y (Incoming)',
        labelLine: 5
      }
    ])
  })

  it('Projects the ancestor between current and incoming', () => {
    const lines = [
      'a',
      '<<<<<<< ours',
      'x',
      '||||||| base',
      'original',
      '=======',
      'y',
      '>>>>>>> theirs'
    ]

    expect(project(lines).map((region) => region.kind)).toEqual([
      'current',
      'ancestor',
      'incoming'
    ])
    expect(project(lines)[1]).toEqual({
      kind: 'ancestor',
      paintRange: { start: 4, end: 4 },
      labelText: 'original (Base)',
      labelLine: 4
    })
    expect(project(lines)[2].labelLine).toBe(7)
  })

  it('Uses fallback words for empty sections', () => {
    const regions = project(['<<<<<<<', '=======', '>>>>>>>'])

    expect(regions.map((region) => region.labelText)).toEqual([
      'Current (Current)',
      'Incoming (Incoming)'
    ])
    expect(regions[1].labelLine).toBe(2)
  })

  it('Keeps only the label of an empty ancestor', () => {
    const regions = project([
      '<<<<<<< ours',
      'x',
      '||||||| base',
      '=======',
      'y',
      '>>>>>>> theirs'
    ])

    expect(regions).toEqual([
      {
        kind: 'current',
        paintRange: { start: 0, end: 1 },
        labelText: 'x (Current)',
        labelLine: 0
      },
      {
        kind: 'ancestor',
        paintRange: null,
        labelText: 'Ancestor (Base)',
        labelLine: 3
      },
      {
        kind: 'incoming',
        paintRange: { start: 4, end: 5 },
        labelText: 'y (Incoming)',
        labelLine: 5
      }
    ])
  })

  it('Never produces an inverted paint range', () => {
    const inputs = [
      ['<<<<<<<', '|||||||', '=======', '>>>>>>>'],
      ['<<<<<<<', '=======', '>>>>>>>'],
      ['<<<<<<<', '>>>>>>>'],
      ['<<<<<<<', 'x', '|||||||', '>>>>>>>']
    ]

    for (const lines of inputs) {
      for (const region of project(lines)) {
        if (region.paintRange) {
          expect(region.paintRange.start).toBeLessThanOrEqual(
            region.paintRange.end
          )
        }
      }
    }
  })

  it('Returns nothing without blocks', () => {
    expect(projectRegions(['plain'], [])).toEqual([])
  })
})

describe('formatLabel', () => {
  it('Falls back when the section has no content', () => {
    const lines = ['<<<<<<<', '|||||||', '=======']

    expect(formatLabel(lines, 'ancestor', createSection(2, 1, 2, 1))).toBe(
      'Ancestor (Base)'
    )
  })

  it('Falls back when the content line is out of bounds', () => {
    expect(formatLabel(['only'], 'ancestor', createSection(5, 5, 5, 5))).toBe(
      'Ancestor (Base)'
    )
  })
})
