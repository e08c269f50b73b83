import { Storage } from './Storage'
import { SessionRecord } from '../contracts'

export class MemoryStorage implements Storage {
  private sessionRecord: SessionRecord | null = null

  async getSessionRecord(): Promise<SessionRecord | null> {
    // Hand out copies so callers cannot mutate the stored slot
    return this.sessionRecord ? structuredClone(this.sessionRecord) : null
  }

  async saveSessionRecord(record: SessionRecord): Promise<void> {
    this.sessionRecord = structuredClone(record)
  }

  async deleteSessionRecord(): Promise<void> {
    this.sessionRecord = null
  }

  async hasSessionRecord(): Promise<boolean> {
    return this.sessionRecord !== null
  }
}
