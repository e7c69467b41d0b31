import {
  type ConflictBlock,
  type Section,
  isSectionEmpty
} from '../domains/conflictBlock.js'
import {
  type RegionDescriptor,
  type RegionKind,
  createRegionDescriptor
} from '../domains/regionDescriptor.js'

const ROLE_NAMES: Record<RegionKind, string> = {
  current: 'Current',
  incoming: 'Incoming',
  ancestor: 'Base'
}

const FALLBACK_LABELS: Record<RegionKind, string> = {
  current: 'Current',
  incoming: 'Incoming',
  ancestor: 'Ancestor'
}

/**
 * Map conflict blocks to the regions a renderer paints, in document order
 */
export const projectRegions = (
  lines: readonly string[],
  blocks: readonly ConflictBlock[]
): RegionDescriptor[] =>
  blocks.flatMap((block) => {
    const regions = [
      projectSection(lines, 'current', block.current, block.current.rangeStart)
    ]
    if (block.ancestor) {
      regions.push(
        projectSection(
          lines,
          'ancestor',
          block.ancestor,
          block.ancestor.rangeStart
        )
      )
    }
    regions.push(
      projectSection(lines, 'incoming', block.incoming, block.incoming.rangeEnd)
    )
    return regions
  })

const projectSection = (
  lines: readonly string[],
  kind: RegionKind,
  section: Section,
  labelLine: number
): RegionDescriptor =>
  createRegionDescriptor(
    kind,
    section.rangeEnd < section.rangeStart
      ? null
      : { start: section.rangeStart, end: section.rangeEnd },
    formatLabel(lines, kind, section),
    labelLine
  )

/**
 * First content line of the section followed by its role, e.g. `foo (Current)`.
 * The fallback word stands in when the section has no content or its first
 * content line is out of bounds.
 */
export const formatLabel = (
  lines: readonly string[],
  kind: RegionKind,
  section: Section
): string => {
  const index = section.contentStart
  const firstLine =
    !isSectionEmpty(section) && index >= 0 && index < lines.length
      ? lines[index]
      : FALLBACK_LABELS[kind]
  return `${firstLine} (${ROLE_NAMES[kind]})`
}
