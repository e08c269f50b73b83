import { SessionRecord } from '../contracts'

/**
 * Single-slot store for the active session record.
 */
export interface Storage {
  // Resolves to null when no session is active
  getSessionRecord(): Promise<SessionRecord | null>
  // Replaces the slot in one step; readers see the old record or the new one
  saveSessionRecord(record: SessionRecord): Promise<void>
  // No-op when the slot is empty
  deleteSessionRecord(): Promise<void>
  // True if something occupies the slot, even a record that fails to parse
  hasSessionRecord(): Promise<boolean>
}
