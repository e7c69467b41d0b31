import * as core from '@actions/core'
import type { ConflictPalette } from '../domains/conflictPalette.js'
import { toHexColor } from '../domains/packedColor.js'
import type { RegionDescriptor } from '../domains/regionDescriptor.js'
import type { RendererPort } from '../domains/rendererPort.js'
import { createRegionBuffer } from './regionBuffer.js'

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
}

export const escapeHtml = (text: string): string =>
  text.replace(/[&<>"']/g, (character) => HTML_ESCAPES[character] ?? character)

/**
 * Table of a file's regions: label cell on the label background, line range
 * on the section background, then the line the label is anchored to
 */
export const renderRegionTable = (
  regions: readonly RegionDescriptor[],
  palette: ConflictPalette
): string => {
  const rows = regions.map((region) => {
    const colors = palette[region.kind]
    const lines = region.paintRange
      ? `${region.paintRange.start + 1}-${region.paintRange.end + 1}`
      : 'none'
    return (
      `<tr><td style="background-color:${toHexColor(colors.labelBackground)}">` +
      `${escapeHtml(region.labelText)}</td>` +
      `<td style="background-color:${toHexColor(colors.background)}">${lines}</td>` +
      `<td>${region.labelLine + 1}</td></tr>`
    )
  })
  return (
    '<table><tr><th>Section</th><th>Lines</th><th>Label line</th></tr>' +
    `${rows.join('')}</table>`
  )
}

/**
 * Renders painted regions into the job summary, one table per file
 */
export const createSummaryRenderer = (
  palette: ConflictPalette,
  heading = 'Conflict blocks'
): RendererPort => {
  const buffer = createRegionBuffer()

  return {
    clear: buffer.clear,
    paint: buffer.add,
    flush: async (): Promise<void> => {
      const entries = buffer.entries()
      if (entries.length === 0) {
        return
      }

      core.summary.addHeading(escapeHtml(heading), 2)
      for (const [file, regions] of entries) {
        core.summary.addHeading(escapeHtml(file), 3)
        core.summary.addRaw(renderRegionTable(regions, palette), true)
      }
      await core.summary.write()
      buffer.reset()
    }
  }
}
