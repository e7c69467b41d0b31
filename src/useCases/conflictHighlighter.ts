import type { ConflictBlock } from '../domains/conflictBlock.js'
import type { LineSourcePort } from '../domains/lineSourcePort.js'
import type { RendererPort } from '../domains/rendererPort.js'
import { parseConflictBlocks } from './conflictBlockParser.js'
import { projectRegions } from './regionProjector.js'

export type ConflictHighlighter = {
  /**
   * Reparse the source and repaint its regions. Resolves to null when the
   * source could not be read.
   */
  refresh(sourceId: string): Promise<ConflictBlock[] | null>
  clear(sourceId: string): void
}

/**
 * Create a highlighter that fully recomputes a source on every refresh
 */
export const createConflictHighlighter = (dependencies: {
  lineSource: LineSourcePort
  renderer: RendererPort
}): ConflictHighlighter => {
  const { lineSource, renderer } = dependencies

  return {
    refresh: async (sourceId: string): Promise<ConflictBlock[] | null> => {
      const lines = await lineSource.snapshot(sourceId)
      renderer.clear(sourceId)
      if (!lines) {
        return null
      }

      const blocks = parseConflictBlocks(lines)
      for (const region of projectRegions(lines, blocks)) {
        renderer.paint(sourceId, region)
      }
      return blocks
    },

    clear: (sourceId: string): void => {
      renderer.clear(sourceId)
    }
  }
}
