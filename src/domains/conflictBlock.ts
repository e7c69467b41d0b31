/**
 * One side of a conflict block. All indices are zero-based and inclusive;
 * content is empty when contentEnd < contentStart.
 */
export type Section = {
  readonly rangeStart: number
  readonly rangeEnd: number
  readonly contentStart: number
  readonly contentEnd: number
}

export type BlockMarkers = {
  readonly startLine: number
  readonly middleLine: number | null
  readonly finishLine: number
}

export type ConflictBlock = {
  readonly current: Section
  readonly ancestor: Section | null
  readonly incoming: Section
  readonly markers: BlockMarkers
}

export const createSection = (
  rangeStart: number,
  rangeEnd: number,
  contentStart: number,
  contentEnd: number
): Section => ({
  rangeStart,
  rangeEnd,
  contentStart,
  contentEnd
})

export const createConflictBlock = (
  current: Section,
  ancestor: Section | null,
  incoming: Section,
  markers: BlockMarkers
): ConflictBlock => ({
  current,
  ancestor,
  incoming,
  markers
})

export const isSectionEmpty = (section: Section): boolean =>
  section.contentEnd < section.contentStart
