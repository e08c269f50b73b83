import { Command, CommandRegistry as ICommandRegistry } from './types'

export class CommandRegistry implements ICommandRegistry {
  private commands: Command[] = []
  private names = new Set<string>()

  register(command: Command): void {
    const names = [command.name, ...(command.aliases ?? [])].map((name) => name.toLowerCase())
    for (const name of names) {
      if (this.names.has(name)) {
        throw new Error(`Command name already registered: ${name}`)
      }
    }

    this.commands.push(command)
    for (const name of names) {
      this.names.add(name)
    }
  }

  // Registration order, one entry per command
  getAll(): Command[] {
    return [...this.commands]
  }

  static createWithDefaults(commands: Command[]): CommandRegistry {
    const registry = new CommandRegistry()
    for (const command of commands) {
      registry.register(command)
    }
    return registry
  }
}
