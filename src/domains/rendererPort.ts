import type { RegionDescriptor } from './regionDescriptor.js'

/**
 * Rendering surface for conflict regions
 */
export type RendererPort = {
  /**
   * Drop every region previously painted for the source
   */
  clear(sourceId: string): void
  paint(sourceId: string, region: RegionDescriptor): void
  /**
   * Commit painted regions to the output surface
   */
  flush(): Promise<void>
}
