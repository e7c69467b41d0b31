import type { RegionDescriptor } from '../domains/regionDescriptor.js'
import type { RendererPort } from '../domains/rendererPort.js'

/**
 * Painted regions grouped by source, kept until a renderer flushes them
 */
export type RegionBuffer = {
  clear(sourceId: string): void
  add(sourceId: string, region: RegionDescriptor): void
  entries(): [string, readonly RegionDescriptor[]][]
  reset(): void
}

export const createRegionBuffer = (): RegionBuffer => {
  const regions = new Map<string, RegionDescriptor[]>()

  return {
    clear: (sourceId: string): void => {
      regions.delete(sourceId)
    },
    add: (sourceId: string, region: RegionDescriptor): void => {
      const painted = regions.get(sourceId)
      if (painted) {
        painted.push(region)
      } else {
        regions.set(sourceId, [region])
      }
    },
    entries: () => [...regions.entries()],
    reset: (): void => {
      regions.clear()
    }
  }
}

/**
 * Fan every renderer call out to each of the given renderers
 */
export const combineRenderers = (
  ...renderers: RendererPort[]
): RendererPort => ({
  clear: (sourceId: string): void => {
    for (const renderer of renderers) {
      renderer.clear(sourceId)
    }
  },
  paint: (sourceId: string, region: RegionDescriptor): void => {
    for (const renderer of renderers) {
      renderer.paint(sourceId, region)
    }
  },
  flush: async (): Promise<void> => {
    for (const renderer of renderers) {
      await renderer.flush()
    }
  }
})
