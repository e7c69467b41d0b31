export type RegionKind = 'current' | 'incoming' | 'ancestor'

/**
 * Inclusive line range, zero-based
 */
export type LineRange = {
  readonly start: number
  readonly end: number
}

/**
 * Render instruction for one section of a conflict block
 */
export type RegionDescriptor = {
  readonly kind: RegionKind
  /**
   * Null when the section spans no lines; the label is still drawn
   */
  readonly paintRange: LineRange | null
  readonly labelText: string
  readonly labelLine: number
}

export const createRegionDescriptor = (
  kind: RegionKind,
  paintRange: LineRange | null,
  labelText: string,
  labelLine: number
): RegionDescriptor => ({
  kind,
  paintRange,
  labelText,
  labelLine
})
