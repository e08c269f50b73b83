import { Command } from './types'
import { CommandResult } from '../contracts'
import { SessionManager } from '../session/SessionManager'
import { formatSessionStarted, formatWarnings } from '../report/formatSummary'
import { sessionErrorResult } from './errorResult'

export const StartCommand: Command = {
  name: 'start',
  aliases: ['begin'],
  arguments: '<PROJECT_DIRECTORY>',
  description: 'Start a session and record the initial line count of PROJECT_DIRECTORY',
  execute: async (sessionManager: SessionManager, args: string[]): Promise<CommandResult> => {
    const projectDirectory = args[0]
    if (!projectDirectory) {
      return {
        exitCode: 1,
        error: 'Usage: ego start <PROJECT_DIRECTORY>',
      }
    }

    try {
      const { record, scan } = await sessionManager.beginSession(projectDirectory)
      return {
        exitCode: 0,
        output: formatSessionStarted(record),
        warnings: formatWarnings(scan.warnings),
      }
    } catch (error) {
      return sessionErrorResult(error)
    }
  }
}
