#!/usr/bin/env node

import { Command as Program, CommanderError } from 'commander'
import { Command, CommandRegistry, defaultCommands } from '../commands'
import { ConfigLoader } from '../config/ConfigLoader'
import { FileScanner } from '../counting/FileScanner'
import { createDebugLog } from '../logging/debugLog'
import { SessionManager } from '../session/SessionManager'
import { FileStorage } from '../storage/FileStorage'
import packageJson from '../../package.json'

export interface CliIo {
  out: (text: string) => void
  err: (text: string) => void
}

const consoleIo: CliIo = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
}

export function createSessionManager(configPath?: string): SessionManager {
  const config = new ConfigLoader(configPath).getConfig()
  const log = createDebugLog(config.stateDir)
  log({ event: 'config_loaded', stateDir: config.stateDir, scan: config.scan })

  return new SessionManager(new FileStorage(config.stateDir, log), {
    // The state directory may sit inside the project; its files must not count
    scanner: new FileScanner({ ...config.scan, excludePaths: [config.stateDir] }, log),
    log,
  })
}

/**
 * Parse argv, run one command and resolve to the process exit code
 */
export async function run(
  argv: string[],
  io: CliIo = consoleIo,
  commands: Command[] = defaultCommands
): Promise<number> {
  const registry = CommandRegistry.createWithDefaults(commands)
  let exitCode = 0

  const program = new Program()
    .name('ego')
    .description('Track time and net line delta for a coding session')
    .version(packageJson.version)
    .option('-c, --config <path>', 'Path to an ego config file')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    })

  for (const command of registry.getAll()) {
    const sub = program
      .command(command.arguments ? `${command.name} ${command.arguments}` : command.name)
      .description(command.description)
      .aliases(command.aliases ?? [])

    sub.action(async () => {
      const { config } = program.opts<{ config?: string }>()
      const result = await command.execute(createSessionManager(config), sub.args)

      if (result.output) {
        io.out(result.output)
      }
      if (result.error) {
        io.err(result.error)
      }
      for (const warning of result.warnings ?? []) {
        io.err(`Warning: ${warning}`)
      }
      exitCode = result.exitCode
    })
  }

  try {
    await program.parseAsync(argv)
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode
    }
    io.err(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`)
    return 2
  }

  return exitCode
}

// Only run if this is the main module
if (require.main === module) {
  run(process.argv).then(
    (code) => {
      process.exitCode = code
    },
    (error: unknown) => {
      console.error('ego: fatal error', error)
      process.exitCode = 2
    }
  )
}
