import {
  type ConflictBlock,
  createConflictBlock,
  createSection
} from '../domains/conflictBlock.js'
import { isBlockOpening, matchMarker } from '../domains/conflictMarker.js'

/**
 * Parse every conflict block in the lines, in document order.
 *
 * Scanning is a single forward pass: after a block is emitted the search
 * resumes on the line following its finish marker. A block that is never
 * closed is dropped, and since no later line can close one either, the
 * scan stops there.
 */
export const parseConflictBlocks = (
  lines: readonly string[]
): ConflictBlock[] => {
  const blocks: ConflictBlock[] = []
  let position = 0

  while (position < lines.length) {
    if (!isBlockOpening(matchMarker(lines[position]))) {
      position++
      continue
    }

    const block = scanBlock(lines, position)
    if (!block) {
      break
    }

    blocks.push(block)
    position = block.markers.finishLine + 1
  }

  return blocks
}

/**
 * Scan forward from an opening marker until the block's finish marker
 */
const scanBlock = (
  lines: readonly string[],
  blockStart: number
): ConflictBlock | null => {
  let ancestorLine: number | null = null
  let middleLine: number | null = null

  for (let index = blockStart + 1; index < lines.length; index++) {
    const markerType = matchMarker(lines[index])

    if (
      markerType === 'ancestor' &&
      ancestorLine === null &&
      middleLine === null
    ) {
      ancestorLine = index
    } else if (markerType === 'middle' && middleLine === null) {
      middleLine = index
    } else if (markerType === 'finish') {
      return closeBlock(blockStart, ancestorLine, middleLine, index)
    }
  }

  return null
}

const closeBlock = (
  blockStart: number,
  ancestorLine: number | null,
  middleLine: number | null,
  finishLine: number
): ConflictBlock => {
  // Without a divider, current (or ancestor) runs up to the finish marker
  // and incoming collapses to an empty section on the finish line
  const dividerLine = middleLine ?? finishLine

  const currentEnd = (ancestorLine ?? dividerLine) - 1
  const current = createSection(
    blockStart,
    currentEnd,
    blockStart + 1,
    currentEnd
  )

  const ancestor =
    ancestorLine === null
      ? null
      : createSection(
          ancestorLine + 1,
          dividerLine - 1,
          ancestorLine + 1,
          dividerLine - 1
        )

  const incomingStart = middleLine === null ? finishLine : middleLine + 1
  const incoming = createSection(
    incomingStart,
    finishLine,
    incomingStart,
    finishLine - 1
  )

  return createConflictBlock(current, ancestor, incoming, {
    startLine: blockStart,
    middleLine,
    finishLine
  })
}
