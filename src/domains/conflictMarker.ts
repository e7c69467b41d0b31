/**
 * Conflict marker prefixes, in the order they are checked
 */
export const CONFLICT_MARKERS = {
  header: '%%%%%%',
  start: '<<<<<<<',
  ancestor: '|||||||',
  middle: '=======',
  finish: '>>>>>>>'
} as const

export type MarkerType = keyof typeof CONFLICT_MARKERS

const MARKER_TYPES: readonly MarkerType[] = [
  'header',
  'start',
  'ancestor',
  'middle',
  'finish'
]

/**
 * Classify a line by the conflict marker it starts with
 */
export const matchMarker = (line: string): MarkerType | null => {
  for (const markerType of MARKER_TYPES) {
    if (line.startsWith(CONFLICT_MARKERS[markerType])) {
      return markerType
    }
  }
  return null
}

/**
 * Check if a line opens a conflict block
 */
export const isBlockOpening = (markerType: MarkerType | null): boolean =>
  markerType === 'header' || markerType === 'start'
