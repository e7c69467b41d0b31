import { type MarkerType, matchMarker } from '../domains/conflictMarker.js'

/**
 * Collect the marker types found on lines added by a unified diff patch
 */
export const findMarkersInPatch = (patch: string): MarkerType[] => {
  const markers: MarkerType[] = []

  for (const line of patch.split('\n')) {
    // Only added lines count; '+++' is a file header
    if (!line.startsWith('+') || line.startsWith('+++')) {
      continue
    }
    const markerType = matchMarker(line.substring(1))
    if (markerType) {
      markers.push(markerType)
    }
  }

  return markers
}

/**
 * Check whether a patch adds any conflict marker line
 */
export const hasConflictMarkersInPatch = (patch: string): boolean =>
  findMarkersInPatch(patch).length > 0

/**
 * Split file content into lines, without the empty line after a final newline
 */
export const splitLines = (content: string): string[] => {
  const lines = content.split(/\r?\n/)
  if (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop()
  }
  return lines
}
