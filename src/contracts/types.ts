import { ScanWarning } from '../counting/types'

export interface RecordedFile {
  lineCount: number
  charCount: number
  hash: string
}

export interface SessionRecord {
  id: string
  projectPath: string
  startTime: string
  initialLineCount: number
  initialCharCount: number
  // Keyed by path relative to projectPath
  files: Record<string, RecordedFile>
}

export interface SessionSummary {
  sessionId: string
  projectPath: string
  startTime: string
  endTime: string
  durationMs: number
  initialLineCount: number
  finalLineCount: number
  linesDelta: number
  initialCharCount: number
  finalCharCount: number
  charsDelta: number
  filesCreated: string[]
  filesModified: string[]
  filesDeleted: string[]
  warnings: ScanWarning[]
}

export interface EgoConfig {
  stateDir: string
  scan: {
    includeHidden: boolean
    concurrency: number
  }
}

export interface CommandResult {
  exitCode: number
  // Printed to stdout
  output?: string
  // Printed to stderr, before any warnings
  error?: string
  warnings?: string[]
}
