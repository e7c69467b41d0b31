/**
 * Output port type definition
 */
export type OutputPort = {
  setConflictsFound(found: boolean): void
  setConflictedFiles(files: string[]): void
  setConflictCount(count: number): void
  reportFailure(message: string): void
  reportWarning(message: string): void
}
