import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { SessionManager } from './SessionManager'
import { MemoryStorage } from '../storage/MemoryStorage'
import { FileStorage } from '../storage/FileStorage'
import { FileScanner } from '../counting/FileScanner'
import { SessionRecord } from '../contracts'
import { SessionError } from '../errors/SessionError'
import fs from 'fs'
import path from 'path'
import os from 'os'

const lines = (count: number, prefix = 'line'): string =>
  Array.from({ length: count }, (_, i) => `${prefix} ${i + 1}\n`).join('')

// Hands out the given instants in order, repeating the last one
const clockAt = (...isoTimes: string[]) => {
  let calls = 0
  return () => new Date(isoTimes[Math.min(calls++, isoTimes.length - 1)])
}

const errorCode = async (promise: Promise<unknown>): Promise<string | undefined> => {
  const error = await promise.then(() => undefined, (e: unknown) => e)
  return error instanceof SessionError ? error.code : undefined
}

class CrashingStorage extends MemoryStorage {
  crashOnSave = true

  async saveSessionRecord(record: SessionRecord): Promise<void> {
    if (this.crashOnSave) {
      this.crashOnSave = false
      throw new Error('process killed mid-write')
    }
    await super.saveSessionRecord(record)
  }
}

describe('SessionManager', () => {
  let projectDir: string
  let storage: MemoryStorage

  beforeEach(() => {
    projectDir = fs.mkdtempSync(path.join(os.tmpdir(), 'session-test-'))
    storage = new MemoryStorage()
  })

  afterEach(() => {
    fs.rmSync(projectDir, { recursive: true, force: true })
  })

  describe('beginSession', () => {
    it('should persist path, start time and initial count', async () => {
      fs.writeFileSync(path.join(projectDir, 'a.rs'), lines(10))
      const manager = new SessionManager(storage, { clock: clockAt('2026-05-04T08:00:00.000Z') })

      const { record } = await manager.beginSession(projectDir)

      expect(record.projectPath).toBe(path.resolve(projectDir))
      expect(record.startTime).toBe('2026-05-04T08:00:00.000Z')
      expect(record.initialLineCount).toBe(10)
      expect(Object.keys(record.files)).toEqual(['a.rs'])
      expect(await storage.getSessionRecord()).toEqual(record)
    })

    it('should resolve a relative project path', async () => {
      const manager = new SessionManager(storage)
      const relative = path.relative(process.cwd(), projectDir)

      const { record } = await manager.beginSession(relative)

      expect(record.projectPath).toBe(path.resolve(projectDir))
    })

    it('should fail with SESSION_ALREADY_ACTIVE when called twice', async () => {
      const manager = new SessionManager(storage)
      await manager.beginSession(projectDir)

      expect(await errorCode(manager.beginSession(projectDir))).toBe('SESSION_ALREADY_ACTIVE')
    })

    it('should keep the first record when a second begin is rejected', async () => {
      const other = fs.mkdtempSync(path.join(os.tmpdir(), 'session-other-'))
      try {
        const manager = new SessionManager(storage)
        const { record } = await manager.beginSession(projectDir)
        await manager.beginSession(other).catch(() => undefined)

        expect((await storage.getSessionRecord())?.id).toBe(record.id)
      } finally {
        fs.rmSync(other, { recursive: true, force: true })
      }
    })

    it('should fail with INVALID_PATH and write nothing for a missing directory', async () => {
      const manager = new SessionManager(storage)

      expect(await errorCode(manager.beginSession(path.join(projectDir, 'missing')))).toBe('INVALID_PATH')
      expect(await storage.getSessionRecord()).toBeNull()
    })

    it('should reject a regular file as project path', async () => {
      const filePath = path.join(projectDir, 'main.rs')
      fs.writeFileSync(filePath, lines(2))
      const manager = new SessionManager(storage)

      expect(await errorCode(manager.beginSession(filePath))).toBe('INVALID_PATH')
      expect(await storage.getSessionRecord()).toBeNull()
    })

    it('should leave no record when the write is interrupted, so a retry succeeds', async () => {
      const crashing = new CrashingStorage()
      const manager = new SessionManager(crashing)

      await expect(manager.beginSession(projectDir)).rejects.toThrow('process killed mid-write')
      expect(await crashing.getSessionRecord()).toBeNull()

      const { record } = await manager.beginSession(projectDir)
      expect(record.projectPath).toBe(path.resolve(projectDir))
    })

    it('should pass scan warnings back to the caller', async () => {
      fs.writeFileSync(path.join(projectDir, 'data.json'), Buffer.from([0x00, 0x01]))
      const manager = new SessionManager(storage)

      const { record, scan } = await manager.beginSession(projectDir)

      expect(record.initialLineCount).toBe(0)
      expect(scan.warnings).toHaveLength(1)
      expect(scan.warnings[0].reason).toBe('binary')
    })
  })

  describe('endSession', () => {
    it('should fail with NO_ACTIVE_SESSION without a prior begin', async () => {
      const manager = new SessionManager(storage)
      expect(await errorCode(manager.endSession())).toBe('NO_ACTIVE_SESSION')
    })

    it('should report zero delta when nothing changed', async () => {
      fs.writeFileSync(path.join(projectDir, 'a.rs'), lines(10))
      const manager = new SessionManager(storage, {
        clock: clockAt('2026-05-04T08:00:00.000Z', '2026-05-04T08:00:00.250Z'),
      })

      await manager.beginSession(projectDir)
      const summary = await manager.endSession()

      expect(summary.linesDelta).toBe(0)
      expect(summary.charsDelta).toBe(0)
      expect(summary.durationMs).toBe(250)
      expect(summary.filesCreated).toEqual([])
      expect(summary.filesModified).toEqual([])
      expect(summary.filesDeleted).toEqual([])
    })

    it('should measure appended lines', async () => {
      const file = path.join(projectDir, 'a.rs')
      fs.writeFileSync(file, lines(10))
      const manager = new SessionManager(storage, {
        clock: clockAt('2026-05-04T08:00:00.000Z', '2026-05-04T09:25:30.000Z'),
      })

      const { record } = await manager.beginSession(projectDir)
      expect(record.initialLineCount).toBe(10)

      fs.appendFileSync(file, lines(5, 'added'))
      const summary = await manager.endSession()

      expect(summary).toMatchObject({
        sessionId: record.id,
        projectPath: path.resolve(projectDir),
        startTime: '2026-05-04T08:00:00.000Z',
        endTime: '2026-05-04T09:25:30.000Z',
        durationMs: 5_130_000,
        initialLineCount: 10,
        finalLineCount: 15,
        linesDelta: 5,
        filesModified: ['a.rs'],
      })
    })

    it('should combine removed lines and new files into one delta', async () => {
      const file = path.join(projectDir, 'a.rs')
      fs.writeFileSync(file, lines(10))
      const manager = new SessionManager(storage)

      await manager.beginSession(projectDir)
      fs.writeFileSync(file, lines(7))
      fs.writeFileSync(path.join(projectDir, 'b.py'), lines(4))
      const summary = await manager.endSession()

      expect(summary.initialLineCount).toBe(10)
      expect(summary.finalLineCount).toBe(11)
      expect(summary.linesDelta).toBe(1)
      expect(summary.filesCreated).toEqual(['b.py'])
      expect(summary.filesModified).toEqual(['a.rs'])
    })

    it('should report a negative delta and deleted files', async () => {
      fs.mkdirSync(path.join(projectDir, 'src'))
      fs.writeFileSync(path.join(projectDir, 'src', 'old.ts'), lines(6))
      fs.writeFileSync(path.join(projectDir, 'keep.ts'), lines(2))
      const manager = new SessionManager(storage)

      await manager.beginSession(projectDir)
      fs.rmSync(path.join(projectDir, 'src', 'old.ts'))
      const summary = await manager.endSession()

      expect(summary.linesDelta).toBe(-6)
      expect(summary.filesDeleted).toEqual(['src/old.ts'])
    })

    it('should count characters written', async () => {
      const file = path.join(projectDir, 'notes.md')
      fs.writeFileSync(file, 'abc\n')
      const manager = new SessionManager(storage)

      await manager.beginSession(projectDir)
      fs.appendFileSync(file, 'de\n')
      const summary = await manager.endSession()

      expect(summary.initialCharCount).toBe(4)
      expect(summary.finalCharCount).toBe(7)
      expect(summary.charsDelta).toBe(3)
    })

    it('should delete the record after a successful end', async () => {
      const manager = new SessionManager(storage)
      await manager.beginSession(projectDir)
      await manager.endSession()

      expect(await storage.getSessionRecord()).toBeNull()
      expect(await errorCode(manager.endSession())).toBe('NO_ACTIVE_SESSION')
    })

    it('should allow a new session after ending one', async () => {
      const manager = new SessionManager(storage)
      await manager.beginSession(projectDir)
      await manager.endSession()

      const { record } = await manager.beginSession(projectDir)
      expect(record.projectPath).toBe(path.resolve(projectDir))
    })

    it('should keep the record when the project directory disappeared', async () => {
      fs.writeFileSync(path.join(projectDir, 'a.rs'), lines(3))
      const manager = new SessionManager(storage)
      const { record } = await manager.beginSession(projectDir)

      fs.rmSync(projectDir, { recursive: true, force: true })
      expect(await errorCode(manager.endSession())).toBe('PROJECT_PATH_UNAVAILABLE')
      expect(await storage.getSessionRecord()).toEqual(record)

      // Retry once the directory is back
      fs.mkdirSync(projectDir)
      fs.writeFileSync(path.join(projectDir, 'a.rs'), lines(3))
      const summary = await manager.endSession()
      expect(summary.linesDelta).toBe(0)
    })

    it('should clamp the duration when the clock went backwards', async () => {
      const manager = new SessionManager(storage, {
        clock: clockAt('2026-05-04T08:00:00.000Z', '2026-05-04T07:59:00.000Z'),
      })

      await manager.beginSession(projectDir)
      const summary = await manager.endSession()

      expect(summary.durationMs).toBe(0)
    })

    it('should use the configured scanner policy', async () => {
      fs.mkdirSync(path.join(projectDir, '.cache'))
      fs.writeFileSync(path.join(projectDir, '.cache', 'data.json'), lines(20))
      fs.writeFileSync(path.join(projectDir, 'main.go'), lines(3))
      const manager = new SessionManager(storage, { scanner: new FileScanner({ includeHidden: false }) })

      const { record } = await manager.beginSession(projectDir)
      expect(record.initialLineCount).toBe(3)
    })
  })

  describe('getActiveSession', () => {
    it('should return null without a session and the record during one', async () => {
      const manager = new SessionManager(storage)
      expect(await manager.getActiveSession()).toBeNull()

      const { record } = await manager.beginSession(projectDir)
      expect(await manager.getActiveSession()).toEqual(record)
    })
  })

  describe('discardSession', () => {
    it('should drop the active session without measuring', async () => {
      const manager = new SessionManager(storage)
      await manager.beginSession(projectDir)
      fs.rmSync(projectDir, { recursive: true, force: true })

      await manager.discardSession()
      expect(await manager.getActiveSession()).toBeNull()
    })

    it('should fail with NO_ACTIVE_SESSION when nothing is active', async () => {
      const manager = new SessionManager(storage)
      expect(await errorCode(manager.discardSession())).toBe('NO_ACTIVE_SESSION')
    })
  })

  describe('with FileStorage', () => {
    let stateDir: string

    beforeEach(() => {
      stateDir = fs.mkdtempSync(path.join(os.tmpdir(), 'session-state-'))
    })

    afterEach(() => {
      fs.rmSync(stateDir, { recursive: true, force: true })
    })

    it('should carry a session across manager instances', async () => {
      fs.writeFileSync(path.join(projectDir, 'a.rs'), lines(10))
      await new SessionManager(new FileStorage(stateDir)).beginSession(projectDir)

      fs.appendFileSync(path.join(projectDir, 'a.rs'), lines(5))
      const summary = await new SessionManager(new FileStorage(stateDir)).endSession()

      expect(summary.finalLineCount).toBe(15)
      expect(summary.linesDelta).toBe(5)
      expect(fs.existsSync(path.join(stateDir, 'session.json'))).toBe(false)
    })

    it('should start cleanly after a crash left only a temp file', async () => {
      fs.writeFileSync(path.join(stateDir, 'session.json.tmp-1234-abcd'), '{"projectPath":')
      const manager = new SessionManager(new FileStorage(stateDir))

      const { record } = await manager.beginSession(projectDir)
      expect(record.projectPath).toBe(path.resolve(projectDir))
    })

    it('should refuse to begin over a corrupt record until it is discarded', async () => {
      fs.writeFileSync(path.join(stateDir, 'session.json'), 'garbage')
      const manager = new SessionManager(new FileStorage(stateDir))

      expect(await errorCode(manager.beginSession(projectDir))).toBe('CORRUPT_SESSION_RECORD')

      await manager.discardSession()
      const { record } = await manager.beginSession(projectDir)
      expect(record.initialLineCount).toBe(0)
    })
  })
})
