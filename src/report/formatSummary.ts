import { SessionRecord, SessionSummary } from '../contracts'
import { ScanWarning } from '../counting/types'

const pad = (value: number): string => String(value).padStart(2, '0')

/**
 * HH:MM:SS; hours keep growing past 24
 */
export function formatDuration(durationMs: number): string {
  const totalSeconds = Math.max(0, Math.floor(durationMs / 1000))
  const hours = Math.floor(totalSeconds / 3600)
  const minutes = Math.floor((totalSeconds % 3600) / 60)
  const seconds = totalSeconds % 60
  return `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`
}

export function formatDelta(delta: number): string {
  return `${delta > 0 ? '+' : ''}${delta}`
}

export function formatSummary(summary: SessionSummary): string {
  let message = `Session ended for ${summary.projectPath}\n\n`

  message += 'Session Statistics:\n'
  message += `   Duration: ${formatDuration(summary.durationMs)}\n`
  message += `   Initial lines: ${summary.initialLineCount}\n`
  message += `   Final lines: ${summary.finalLineCount}\n`
  message += `   Lines delta: ${formatDelta(summary.linesDelta)}\n`
  message += `   Characters delta: ${formatDelta(summary.charsDelta)}\n\n`

  message += 'File Changes:\n'
  message += `   Created: ${summary.filesCreated.length}\n`
  message += `   Modified: ${summary.filesModified.length}\n`
  message += `   Deleted: ${summary.filesDeleted.length}\n`

  return message.trimEnd()
}

export function formatSessionStarted(record: SessionRecord): string {
  let message = `Session started in directory: ${record.projectPath}\n`
  message += `   Initial line count: ${record.initialLineCount}\n`
  message += `   Initial character count: ${record.initialCharCount}`
  return message
}

export function formatStatus(record: SessionRecord | null, now: Date): string {
  if (!record) {
    return 'No active session.'
  }
  const elapsedMs = now.getTime() - Date.parse(record.startTime)

  let message = `Session active in directory: ${record.projectPath}\n`
  message += `   Started: ${record.startTime}\n`
  message += `   Elapsed: ${formatDuration(elapsedMs)}\n`
  message += `   Initial line count: ${record.initialLineCount}\n`
  message += `   Tracked files: ${Object.keys(record.files).length}`
  return message
}

export function formatWarnings(warnings: ScanWarning[]): string[] {
  return warnings.map((warning) => `Skipped ${warning.path} (${warning.reason}: ${warning.message})`)
}
