import { CommandResult } from '../contracts'
import { SessionManager } from '../session/SessionManager'

export interface Command {
  name: string
  aliases?: string[]
  // Positional arguments in commander syntax, e.g. '<PROJECT_DIRECTORY>'
  arguments?: string
  description: string
  execute: (sessionManager: SessionManager, args: string[]) => Promise<CommandResult>
}

export interface CommandRegistry {
  register(command: Command): void
  getAll(): Command[]
}
