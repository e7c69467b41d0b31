import * as core from '@actions/core'
import type { RegionKind } from '../domains/regionDescriptor.js'
import type { RendererPort } from '../domains/rendererPort.js'
import { createRegionBuffer } from './regionBuffer.js'

const TITLES: Record<RegionKind, string> = {
  current: 'Current change',
  incoming: 'Incoming change',
  ancestor: 'Base'
}

/**
 * Renders each region as notice annotations on the changed file: one covering
 * its lines and one carrying its label on the label line
 */
export const createAnnotationRenderer = (): RendererPort => {
  const buffer = createRegionBuffer()

  return {
    clear: buffer.clear,
    paint: buffer.add,
    flush: async (): Promise<void> => {
      for (const [file, regions] of buffer.entries()) {
        for (const region of regions) {
          const title = TITLES[region.kind]
          if (region.paintRange) {
            const startLine = region.paintRange.start + 1
            const endLine = region.paintRange.end + 1
            core.notice(`${title} (lines ${startLine}-${endLine})`, {
              title,
              file,
              startLine,
              endLine
            })
          }
          core.notice(region.labelText, {
            title: `${title} label`,
            file,
            startLine: region.labelLine + 1,
            endLine: region.labelLine + 1
          })
        }
      }
      buffer.reset()
    }
  }
}
