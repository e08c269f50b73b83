import { promises as fs, constants, Dirent, Stats } from 'fs'
import path from 'path'
import crypto from 'crypto'
import { FileDiff, FileSnapshot, ScanOptions, ScanResult, ScanWarning } from './types'
import { LocCounter } from './LocCounter'
import { RECOGNIZED_EXTENSIONS, isRecognizedFile } from './extensions'
import { CounterError } from '../errors/SessionError'
import { DebugLogger, noopDebugLog } from '../logging/debugLog'

const DEFAULT_CONCURRENCY = 8

type FileOutcome =
  | { kind: 'counted'; snapshot: FileSnapshot }
  | { kind: 'skipped'; warning: ScanWarning }

export class FileScanner {
  private locCounter = new LocCounter()
  private includeHidden: boolean
  private concurrency: number
  private extensions: ReadonlySet<string>
  private excludePaths: string[]

  constructor(
    options: ScanOptions = {},
    private log: DebugLogger = noopDebugLog
  ) {
    this.includeHidden = options.includeHidden ?? true
    const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY
    this.concurrency = Number.isFinite(concurrency) ? Math.max(1, Math.floor(concurrency)) : DEFAULT_CONCURRENCY
    this.extensions = options.extensions ?? RECOGNIZED_EXTENSIONS
    this.excludePaths = (options.excludePaths ?? []).map((excluded) => path.resolve(excluded))
  }

  /**
   * Total physical line count of every qualifying file under root
   */
  async countLines(root: string): Promise<number> {
    const result = await this.scan(root)
    return result.totalLines
  }

  /**
   * Scan all qualifying files under root
   */
  async scan(root: string): Promise<ScanResult> {
    const resolvedRoot = path.resolve(root)
    await this.assertDirectory(resolvedRoot)

    const warnings: ScanWarning[] = []
    const filePaths = await this.collectFiles(resolvedRoot, warnings)
    const outcomes = await this.mapWithConcurrency(filePaths, (filePath) => this.scanFile(filePath))

    const files = new Map<string, FileSnapshot>()
    let totalLines = 0
    let totalChars = 0

    for (const outcome of outcomes) {
      if (outcome.kind === 'skipped') {
        warnings.push(outcome.warning)
        this.log({ event: 'file_skipped', ...outcome.warning })
        continue
      }
      const key = this.relativeKey(resolvedRoot, outcome.snapshot.path)
      files.set(key, outcome.snapshot)
      totalLines += outcome.snapshot.lineCount
      totalChars += outcome.snapshot.charCount
    }

    this.log({
      event: 'scan_complete',
      root: resolvedRoot,
      fileCount: files.size,
      totalLines,
      totalChars,
      warningCount: warnings.length,
    })

    return { root: resolvedRoot, files, totalLines, totalChars, warnings }
  }

  /**
   * Compare the per-file state of two scans of the same root
   */
  diff(before: Map<string, Pick<FileSnapshot, 'hash'>>, after: Map<string, Pick<FileSnapshot, 'hash'>>): FileDiff {
    const created: string[] = []
    const modified: string[] = []
    const deleted: string[] = []

    for (const [key, beforeFile] of before) {
      const afterFile = after.get(key)
      if (!afterFile) {
        deleted.push(key)
      } else if (afterFile.hash !== beforeFile.hash) {
        modified.push(key)
      }
    }

    for (const key of after.keys()) {
      if (!before.has(key)) {
        created.push(key)
      }
    }

    return { created: created.sort(), modified: modified.sort(), deleted: deleted.sort() }
  }

  private async assertDirectory(root: string): Promise<void> {
    let stats: Stats
    try {
      stats = await fs.stat(root)
    } catch (error) {
      throw new CounterError(`Cannot access project path ${root}`, root, error)
    }
    if (!stats.isDirectory()) {
      throw new CounterError(`Project path is not a directory: ${root}`, root)
    }
    try {
      await fs.access(root, constants.R_OK | constants.X_OK)
    } catch (error) {
      throw new CounterError(`Project path is not readable: ${root}`, root, error)
    }
  }

  /**
   * Depth-first walk; symlinks are never followed
   */
  private async collectFiles(root: string, warnings: ScanWarning[]): Promise<string[]> {
    const found: string[] = []
    const pending = [root]

    while (pending.length > 0) {
      const dir = pending.pop()
      if (dir === undefined) break

      let entries: Dirent[]
      try {
        entries = await fs.readdir(dir, { withFileTypes: true })
      } catch (error) {
        // The root was readable a moment ago, so this is a subdirectory
        const warning: ScanWarning = {
          path: dir,
          reason: 'unreadable',
          message: error instanceof Error ? error.message : String(error),
        }
        warnings.push(warning)
        this.log({ event: 'directory_skipped', ...warning })
        continue
      }

      for (const entry of entries) {
        if (!this.includeHidden && entry.name.startsWith('.')) continue

        const entryPath = path.join(dir, entry.name)
        if (this.isExcluded(entryPath)) continue

        if (entry.isDirectory()) {
          pending.push(entryPath)
        } else if (entry.isFile() && isRecognizedFile(entry.name, this.extensions)) {
          found.push(entryPath)
        }
      }
    }

    return found
  }

  // An excluded path hides itself and everything below it
  private isExcluded(entryPath: string): boolean {
    return this.excludePaths.some(
      (excluded) => entryPath === excluded || entryPath.startsWith(excluded + path.sep)
    )
  }

  /**
   * Scan a single file
   */
  private async scanFile(filePath: string): Promise<FileOutcome> {
    let bytes: Buffer
    try {
      bytes = await fs.readFile(filePath)
    } catch (error) {
      // Permission denied, or removed since the directory was listed
      return {
        kind: 'skipped',
        warning: {
          path: filePath,
          reason: 'unreadable',
          message: error instanceof Error ? error.message : String(error),
        },
      }
    }

    const decoded = this.locCounter.decode(bytes)
    if (decoded.kind === 'binary') {
      return {
        kind: 'skipped',
        warning: { path: filePath, reason: 'binary', message: decoded.reason },
      }
    }

    return {
      kind: 'counted',
      snapshot: {
        path: filePath,
        lineCount: this.locCounter.countLines(decoded.content),
        charCount: this.locCounter.countChars(decoded.content),
        hash: this.calculateHash(bytes),
      },
    }
  }

  /**
   * Calculate hash of file content
   */
  private calculateHash(content: Buffer): string {
    return crypto.createHash('sha256').update(content).digest('hex')
  }

  private relativeKey(root: string, filePath: string): string {
    return path.relative(root, filePath).split(path.sep).join('/')
  }

  private async mapWithConcurrency<T, R>(items: T[], fn: (item: T) => Promise<R>): Promise<R[]> {
    const results: R[] = new Array(items.length)
    let next = 0

    const worker = async (): Promise<void> => {
      while (next < items.length) {
        const index = next++
        results[index] = await fn(items[index])
      }
    }

    const workers = Array.from({ length: Math.min(this.concurrency, items.length) }, () => worker())
    await Promise.all(workers)
    return results
  }
}
