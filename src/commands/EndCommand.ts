import { Command } from './types'
import { CommandResult } from '../contracts'
import { SessionManager } from '../session/SessionManager'
import { formatSummary, formatWarnings } from '../report/formatSummary'
import { sessionErrorResult } from './errorResult'

export const EndCommand: Command = {
  name: 'end',
  aliases: ['stop'],
  description: 'End the active session and report duration and line delta',
  execute: async (sessionManager: SessionManager): Promise<CommandResult> => {
    try {
      const summary = await sessionManager.endSession()
      return {
        exitCode: 0,
        output: formatSummary(summary),
        warnings: formatWarnings(summary.warnings),
      }
    } catch (error) {
      return sessionErrorResult(error)
    }
  }
}
