/**
 * File status as reported by the pull request files API
 */
export const FILE_STATUSES = [
  'added',
  'modified',
  'removed',
  'renamed',
  'copied',
  'changed',
  'unchanged'
] as const

export type FileStatus = (typeof FILE_STATUSES)[number]

export const fileStatusFromString = (value: string): FileStatus => {
  const normalized = value.toLowerCase()
  return FILE_STATUSES.find((status) => status === normalized) ?? 'unchanged'
}

export const isFileRemoved = (status: FileStatus): boolean =>
  status === 'removed'
