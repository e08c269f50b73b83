import { v4 as uuidv4 } from 'uuid'
import { Storage } from '../storage/Storage'
import { FileScanner } from '../counting/FileScanner'
import { ScanResult } from '../counting/types'
import { RecordedFile, SessionRecord, SessionSummary } from '../contracts'
import {
  CounterError,
  invalidPathError,
  noActiveSessionError,
  projectPathUnavailableError,
  sessionAlreadyActiveError,
} from '../errors/SessionError'
import { DebugLogger, noopDebugLog } from '../logging/debugLog'

export type Clock = () => Date

export interface SessionManagerOptions {
  scanner?: FileScanner
  clock?: Clock
  log?: DebugLogger
}

export interface BeginSessionResult {
  record: SessionRecord
  scan: ScanResult
}

/**
 * Owns the single persisted session record:
 * NoSession -> beginSession -> Active -> endSession | discardSession -> NoSession
 */
export class SessionManager {
  private scanner: FileScanner
  private clock: Clock
  private log: DebugLogger

  constructor(
    private storage: Storage,
    options: SessionManagerOptions = {}
  ) {
    this.log = options.log ?? noopDebugLog
    this.scanner = options.scanner ?? new FileScanner({}, this.log)
    this.clock = options.clock ?? (() => new Date())
  }

  now(): Date {
    return this.clock()
  }

  async getActiveSession(): Promise<SessionRecord | null> {
    return await this.storage.getSessionRecord()
  }

  async beginSession(projectPath: string): Promise<BeginSessionResult> {
    const existing = await this.storage.getSessionRecord()
    if (existing) {
      throw sessionAlreadyActiveError(existing.projectPath, existing.startTime)
    }

    let scan: ScanResult
    try {
      scan = await this.scanner.scan(projectPath)
    } catch (error) {
      if (error instanceof CounterError) {
        throw invalidPathError(error)
      }
      throw error
    }

    const record: SessionRecord = {
      id: uuidv4(),
      projectPath: scan.root,
      startTime: this.clock().toISOString(),
      initialLineCount: scan.totalLines,
      initialCharCount: scan.totalChars,
      files: this.toRecordedFiles(scan),
    }

    await this.storage.saveSessionRecord(record)

    this.log({
      event: 'session_begin',
      sessionId: record.id,
      projectPath: record.projectPath,
      initialLineCount: record.initialLineCount,
      fileCount: scan.files.size,
    })

    return { record, scan }
  }

  async endSession(): Promise<SessionSummary> {
    const record = await this.storage.getSessionRecord()
    if (!record) {
      throw noActiveSessionError()
    }

    let scan: ScanResult
    try {
      scan = await this.scanner.scan(record.projectPath)
    } catch (error) {
      if (error instanceof CounterError) {
        this.log({ event: 'session_end_failed', sessionId: record.id, error: error.message })
        throw projectPathUnavailableError(record.projectPath, error)
      }
      throw error
    }

    const endTime = this.clock()
    const summary = this.summarize(record, scan, endTime)

    // The record goes only once the summary is complete, so a failed end can be retried
    await this.storage.deleteSessionRecord()

    this.log({
      event: 'session_end',
      sessionId: record.id,
      durationMs: summary.durationMs,
      linesDelta: summary.linesDelta,
      filesCreated: summary.filesCreated.length,
      filesModified: summary.filesModified.length,
      filesDeleted: summary.filesDeleted.length,
    })

    return summary
  }

  /**
   * Drop the active record without measuring; also clears a record that no
   * longer parses
   */
  async discardSession(): Promise<void> {
    if (!(await this.storage.hasSessionRecord())) {
      throw noActiveSessionError()
    }
    await this.storage.deleteSessionRecord()
    this.log({ event: 'session_discarded' })
  }

  private summarize(record: SessionRecord, scan: ScanResult, endTime: Date): SessionSummary {
    const startMs = Date.parse(record.startTime)
    const diff = this.scanner.diff(new Map(Object.entries(record.files)), scan.files)

    return {
      sessionId: record.id,
      projectPath: record.projectPath,
      startTime: record.startTime,
      endTime: endTime.toISOString(),
      durationMs: Math.max(0, endTime.getTime() - startMs),
      initialLineCount: record.initialLineCount,
      finalLineCount: scan.totalLines,
      linesDelta: scan.totalLines - record.initialLineCount,
      initialCharCount: record.initialCharCount,
      finalCharCount: scan.totalChars,
      charsDelta: scan.totalChars - record.initialCharCount,
      filesCreated: diff.created,
      filesModified: diff.modified,
      filesDeleted: diff.deleted,
      warnings: scan.warnings,
    }
  }

  private toRecordedFiles(scan: ScanResult): Record<string, RecordedFile> {
    const files: Record<string, RecordedFile> = {}
    for (const [key, file] of scan.files) {
      files[key] = { lineCount: file.lineCount, charCount: file.charCount, hash: file.hash }
    }
    return files
  }
}
