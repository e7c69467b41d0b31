/**
 * Snapshots the current content of a source as an ordered list of lines
 */
export type LineSourcePort = {
  /**
   * Resolves to null when the source cannot be read
   */
  snapshot(sourceId: string): Promise<readonly string[] | null>
}
