import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import { EgoConfig } from '../contracts/types'
import { EgoConfigFileSchema } from '../contracts/schemas'
import { expandPath, getDefaultStateDir } from './paths'

export const CONFIG_FILE_NAMES = ['.ego.config.json', 'ego.config.json']

export class ConfigLoader {
  static defaultConfig(): EgoConfig {
    return {
      stateDir: getDefaultStateDir(),
      scan: {
        includeHidden: true,
        concurrency: 8,
      },
    }
  }

  private config: EgoConfig
  private loadedFrom: string | null = null

  constructor(
    private configPath?: string,
    private startDir: string = process.cwd()
  ) {
    this.config = this.loadConfig()
  }

  private findConfigFile(): string | null {
    // Start from the given directory and walk up
    let currentDir = path.resolve(this.startDir)

    while (true) {
      for (const configName of CONFIG_FILE_NAMES) {
        const candidate = path.join(currentDir, configName)
        if (fs.existsSync(candidate)) {
          return candidate
        }
      }
      const parentDir = path.dirname(currentDir)
      if (parentDir === currentDir) {
        return null
      }
      currentDir = parentDir
    }
  }

  private loadConfig(): EgoConfig {
    const configPath = this.configPath ? path.resolve(this.configPath) : this.findConfigFile()

    if (!configPath || !fs.existsSync(configPath)) {
      return ConfigLoader.defaultConfig()
    }

    try {
      const rawConfig = fs.readFileSync(configPath, 'utf-8')
      const validated = EgoConfigFileSchema.parse(JSON.parse(rawConfig))
      this.loadedFrom = configPath

      return {
        // Relative state directories are anchored at the config file
        stateDir: validated.stateDir
          ? expandPath(validated.stateDir, path.dirname(configPath))
          : getDefaultStateDir(),
        scan: validated.scan,
      }
    } catch (error) {
      if (error instanceof z.ZodError) {
        console.error(`Invalid config at ${configPath}:`, error.errors)
      } else if (error instanceof SyntaxError) {
        console.error(`Invalid JSON in config file ${configPath}`)
      } else {
        console.error(`Error loading config from ${configPath}:`, error)
      }

      return ConfigLoader.defaultConfig()
    }
  }

  getConfig(): EgoConfig {
    return this.config
  }

  /**
   * Path of the config file in effect, or null when running on defaults
   */
  getConfigPath(): string | null {
    return this.loadedFrom
  }
}
