import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ConfigError} from '../errors.js'

export const configFileName = '.taskcheck.yml'

export type TaskcheckConfig = {
  /** Report through structured JSON logs instead of the interactive output. */
  json?: boolean;
  /** Stop at the first invalid task or unreadable file. */
  failFast?: boolean;
  /** Level of the JSON logger (pino level name). */
  logLevel?: string;
}

/**
 * Loads the project-level `.taskcheck.yml` from a directory, or the file given
 * explicitly. Returns an empty config when the default file does not exist.
 */
export async function loadConfig(dir: string, explicitPath?: string): Promise<TaskcheckConfig> {
  const filePath = explicitPath ?? join(dir, configFileName)
  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (error: unknown) {
    if (!explicitPath && isNotFound(error)) {
      return {}
    }

    throw new ConfigError(`Cannot read config file ${filePath}`, {cause: error})
  }

  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error: unknown) {
    throw new ConfigError(`Invalid YAML in config file ${filePath}`, {cause: error})
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }

  return readConfig(parsed, filePath)
}

function readConfig(parsed: unknown, filePath: string): TaskcheckConfig {
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping`)
  }

  const config: TaskcheckConfig = {}
  for (const [key, value] of Object.entries(parsed)) {
    switch (key) {
      case 'json':
      case 'failFast': {
        if (typeof value !== 'boolean') {
          throw new ConfigError(`Config file ${filePath}: "${key}" must be a boolean`)
        }

        config[key] = value
        break
      }

      case 'logLevel': {
        if (typeof value !== 'string') {
          throw new ConfigError(`Config file ${filePath}: "logLevel" must be a string`)
        }

        config.logLevel = value
        break
      }

      default: {
        throw new ConfigError(`Config file ${filePath}: unknown key "${key}"`)
      }
    }
  }

  return config
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
