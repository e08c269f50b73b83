import { Command } from './types'
import { CommandResult } from '../contracts'
import { SessionManager } from '../session/SessionManager'
import { sessionErrorResult } from './errorResult'

export const DiscardCommand: Command = {
  name: 'discard',
  description: 'Drop the active session without a report',
  execute: async (sessionManager: SessionManager): Promise<CommandResult> => {
    try {
      await sessionManager.discardSession()
      return {
        exitCode: 0,
        output: 'Session discarded.',
      }
    } catch (error) {
      return sessionErrorResult(error)
    }
  }
}
