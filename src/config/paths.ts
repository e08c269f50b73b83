import os from 'os'
import path from 'path'
import envPaths from 'env-paths'

export const APP_NAME = 'ego'

/**
 * Platform user-data directory for the app (XDG data dir on Linux,
 * Application Support on macOS, LocalAppData on Windows)
 */
export function getDefaultStateDir(): string {
  return envPaths(APP_NAME, { suffix: '' }).data
}

/**
 * Expand `~/` and resolve relative paths against baseDir
 */
export function expandPath(filePath: string, baseDir: string = process.cwd()): string {
  if (filePath === '~') {
    return os.homedir()
  }
  if (filePath.startsWith('~/') || filePath.startsWith('~\\')) {
    return path.resolve(os.homedir(), filePath.slice(2))
  }
  return path.resolve(baseDir, filePath)
}
