import { appendFileSync, mkdirSync } from 'fs'
import path from 'path'

export type DebugEvent = { event: string } & Record<string, unknown>

export type DebugLogger = (message: DebugEvent) => void

// Debug logging - only enabled when EGO_DEBUG environment variable is set
export const isDebugEnabled = (env: NodeJS.ProcessEnv = process.env): boolean =>
  env.EGO_DEBUG === 'true' || env.EGO_DEBUG === '1'

export const noopDebugLog: DebugLogger = () => {}

/**
 * Appends one `<time> - <json>` line per event to `<logDir>/debug.log`.
 */
export function createDebugLog(logDir: string, enabled: boolean = isDebugEnabled()): DebugLogger {
  if (!enabled) return noopDebugLog

  const logPath = path.join(logDir, 'debug.log')

  return (message) => {
    // Ensure directory exists
    mkdirSync(logDir, { recursive: true })

    appendFileSync(logPath, `${new Date().toISOString()} - ${JSON.stringify(message)}\n`)
  }
}
