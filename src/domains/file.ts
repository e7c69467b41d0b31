import type { FileStatus } from './fileStatus.js'
import type { ConflictBlock } from './conflictBlock.js'

/**
 * A file changed by the pull request, with the conflict blocks found in it
 */
export type File = {
  readonly fileName: string
  readonly status: FileStatus
  readonly patch?: string
  readonly conflicts: readonly ConflictBlock[]
  readonly hasConflicts: () => boolean
  readonly withConflicts: (conflicts: readonly ConflictBlock[]) => File
}

export const createFile = (
  fileName: string,
  status: FileStatus,
  patch?: string,
  conflicts: readonly ConflictBlock[] = []
): File => ({
  fileName,
  status,
  patch,
  conflicts,
  hasConflicts: () => conflicts.length > 0,
  withConflicts: (blocks: readonly ConflictBlock[]) =>
    createFile(fileName, status, patch, blocks)
})
