import { Command } from './types'
import { CommandResult } from '../contracts'
import { SessionManager } from '../session/SessionManager'
import { formatStatus } from '../report/formatSummary'
import { sessionErrorResult } from './errorResult'

export const StatusCommand: Command = {
  name: 'status',
  description: 'Show the active session, if any',
  execute: async (sessionManager: SessionManager): Promise<CommandResult> => {
    try {
      const record = await sessionManager.getActiveSession()
      return {
        exitCode: 0,
        output: formatStatus(record, sessionManager.now()),
      }
    } catch (error) {
      return sessionErrorResult(error)
    }
  }
}
