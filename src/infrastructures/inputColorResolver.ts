import * as core from '@actions/core'
import type { ColorResolverPort } from '../domains/colorResolverPort.js'
import { type PackedColor, parseHexColor } from '../domains/packedColor.js'

/**
 * Resolve highlight groups from `Group=#rrggbb` entries
 */
export const createInputColorResolver = (
  entries: readonly string[]
): ColorResolverPort => {
  const colors = new Map<string, PackedColor>()

  for (const entry of entries) {
    const separator = entry.indexOf('=')
    const group = separator > 0 ? entry.slice(0, separator).trim() : ''
    const color =
      separator > 0 ? parseHexColor(entry.slice(separator + 1)) : null

    if (!group || color === null) {
      core.warning(`Ignoring invalid highlight color: ${entry}`)
      continue
    }
    colors.set(group, color)
  }

  return {
    resolve: (group: string): PackedColor | null => colors.get(group) ?? null
  }
}
