import * as core from '@actions/core'
import type { ColorResolverPort } from '../domains/colorResolverPort.js'
import {
  type ConflictPalette,
  type HighlightGroups,
  type SectionColors,
  DEFAULT_BACKGROUNDS,
  DEFAULT_HIGHLIGHT_GROUPS
} from '../domains/conflictPalette.js'
import {
  DEFAULT_SHADE_AMOUNT,
  shadeColor,
  toHexColor
} from '../domains/packedColor.js'
import type { RegionKind } from '../domains/regionDescriptor.js'

/**
 * Resolve section backgrounds from highlight groups and derive darker label
 * backgrounds from them
 */
export const resolveConflictPalette = (
  resolver: ColorResolverPort,
  groups: HighlightGroups = DEFAULT_HIGHLIGHT_GROUPS,
  shadeAmount: number = DEFAULT_SHADE_AMOUNT
): ConflictPalette => {
  const colorsFor = (kind: RegionKind): SectionColors => {
    const group = groups[kind]
    let background = resolver.resolve(group)
    if (background === null) {
      background = DEFAULT_BACKGROUNDS[kind]
      core.debug(
        `Highlight group ${group} is not defined, using ${toHexColor(background)}`
      )
    }
    return {
      background,
      labelBackground: shadeColor(background, shadeAmount)
    }
  }

  return {
    current: colorsFor('current'),
    incoming: colorsFor('incoming'),
    ancestor: colorsFor('ancestor')
  }
}
