export * from './types'
export { CommandRegistry } from './CommandRegistry'
export { StartCommand } from './StartCommand'
export { EndCommand } from './EndCommand'
export { StatusCommand } from './StatusCommand'
export { DiscardCommand } from './DiscardCommand'
export { VersionCommand } from './VersionCommand'

import { StartCommand } from './StartCommand'
import { EndCommand } from './EndCommand'
import { StatusCommand } from './StatusCommand'
import { DiscardCommand } from './DiscardCommand'
import { VersionCommand } from './VersionCommand'

export const defaultCommands = [
  StartCommand,
  EndCommand,
  StatusCommand,
  DiscardCommand,
  VersionCommand,
]
