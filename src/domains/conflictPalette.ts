import type { PackedColor } from './packedColor.js'
import type { RegionKind } from './regionDescriptor.js'

export type SectionColors = {
  readonly background: PackedColor
  readonly labelBackground: PackedColor
}

export type ConflictPalette = Readonly<Record<RegionKind, SectionColors>>

/**
 * Highlight group name used for each section
 */
export type HighlightGroups = Readonly<Record<RegionKind, string>>

export const DEFAULT_HIGHLIGHT_GROUPS: HighlightGroups = {
  current: 'DiffText',
  incoming: 'DiffAdd',
  ancestor: 'DiffChange'
}

export const DEFAULT_BACKGROUNDS: Readonly<Record<RegionKind, PackedColor>> = {
  current: 0x405d7e,
  incoming: 0x314753,
  ancestor: 0x68217a
}
