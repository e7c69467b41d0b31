import type { PackedColor } from './packedColor.js'

/**
 * Maps a highlight group name to its background color
 */
export type ColorResolverPort = {
  resolve(group: string): PackedColor | null
}
