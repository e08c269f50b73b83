import { Command } from './types'
import { CommandResult } from '../contracts'
import packageJson from '../../package.json'

export const VersionCommand: Command = {
  name: 'version',
  description: 'Show ego version',
  execute: async (): Promise<CommandResult> => {
    return {
      exitCode: 0,
      output: `ego v${packageJson.version}`,
    }
  }
}
