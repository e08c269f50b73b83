import { promises as fs } from 'fs'
import path from 'path'
import { Storage } from './Storage'
import { writeFileAtomically } from './atomicWrite'
import { SessionRecord, SessionRecordSchema } from '../contracts'
import { corruptSessionRecordError } from '../errors/SessionError'
import { DebugLogger, noopDebugLog } from '../logging/debugLog'

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT'

export class FileStorage implements Storage {
  readonly sessionFile: string

  constructor(
    private dataDir: string,
    private log: DebugLogger = noopDebugLog
  ) {
    this.sessionFile = path.join(this.dataDir, 'session.json')
  }

  async getSessionRecord(): Promise<SessionRecord | null> {
    let data: string
    try {
      data = await fs.readFile(this.sessionFile, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) return null
      this.log({
        event: 'storage_error',
        method: 'getSessionRecord',
        file: this.sessionFile,
        error: error instanceof Error ? error.message : String(error),
      })
      throw corruptSessionRecordError(this.sessionFile, error)
    }

    try {
      return SessionRecordSchema.parse(JSON.parse(data))
    } catch (error) {
      this.log({
        event: 'storage_error',
        method: 'getSessionRecord',
        file: this.sessionFile,
        error: error instanceof Error ? error.message : String(error),
      })
      throw corruptSessionRecordError(this.sessionFile, error)
    }
  }

  async saveSessionRecord(record: SessionRecord): Promise<void> {
    await writeFileAtomically(this.sessionFile, JSON.stringify(record, null, 2))
    this.log({ event: 'record_written', file: this.sessionFile, sessionId: record.id })
  }

  async deleteSessionRecord(): Promise<void> {
    await fs.rm(this.sessionFile, { force: true })
    this.log({ event: 'record_deleted', file: this.sessionFile })
  }

  async hasSessionRecord(): Promise<boolean> {
    try {
      await fs.access(this.sessionFile)
      return true
    } catch (error) {
      if (isMissingFile(error)) return false
      throw error
    }
  }
}
