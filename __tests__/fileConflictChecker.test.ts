/**
 * Unit tests for src/useCases/fileConflictChecker.ts
 */
import {
  findMarkersInPatch,
  hasConflictMarkersInPatch,
  splitLines
} from '../src/useCases/fileConflictChecker.js'

describe('findMarkersInPatch', () => {
  it('Finds markers on added lines only', () => {
    const patch = [
      '+++ b/test.js',
      '@@ -1,2 +1,7 @@',
      ' <<<<<<< context',
      '+<<<<<<< HEAD',
      '+line2',
      '+=======',
      '-=======',
      '+>>>>>>> branch',
      ' line4'
    ].join('\n')

    expect(findMarkersInPatch(patch)).toEqual(['start', 'middle', 'finish'])
  })

  it('Ignores indented markers', () => {
    expect(hasConflictMarkersInPatch('@@ -1 +1 @@\n+  <<<<<<< HEAD')).toBe(
      false
    )
  })

  it('Reports patches without markers', () => {
    expect(hasConflictMarkersInPatch('@@ -1,2 +1,3 @@\n line1\n+line2')).toBe(
      false
    )
    expect(hasConflictMarkersInPatch('@@ -1 +1 @@\n+%%%%%%% diff')).toBe(true)
  })
})

describe('splitLines', () => {
  it('Splits on LF and CRLF and drops the final newline', () => {
    expect(splitLines('a\r\nb\n')).toEqual(['a', 'b'])
    expect(splitLines('a\n\n')).toEqual(['a', ''])
    expect(splitLines('')).toEqual([''])
  })
})
