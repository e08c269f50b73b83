export interface FileSnapshot {
  path: string
  lineCount: number
  charCount: number
  hash: string
}

export type ScanWarningReason = 'binary' | 'unreadable'

/** A qualifying file or directory the scan had to leave out. */
export interface ScanWarning {
  path: string
  reason: ScanWarningReason
  message: string
}

export interface ScanResult {
  root: string
  // Keyed by path relative to root, with forward slashes
  files: Map<string, FileSnapshot>
  totalLines: number
  totalChars: number
  warnings: ScanWarning[]
}

export interface ScanOptions {
  includeHidden?: boolean
  concurrency?: number
  extensions?: ReadonlySet<string>
  // Absolute paths left out of every scan, e.g. the session state directory
  excludePaths?: string[]
}

export interface FileDiff {
  created: string[]
  modified: string[]
  deleted: string[]
}
