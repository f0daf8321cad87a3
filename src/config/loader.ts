// src/config/loader.ts
import { existsSync, readFileSync } from 'fs'
import { join } from 'path'
import { homedir } from 'os'
import { parse } from 'yaml'
import { LocatorConfigSchema } from './types.js'
import type { LocatorConfig } from './types.js'

export const CONFIG_DIR_NAME = '.feature-locator'

export function getDefaultConfigPath(baseDir: string = homedir()): string {
  return join(baseDir, CONFIG_DIR_NAME, 'config.yaml')
}

/**
 * Replace `${NAME}` with the environment value, or an empty string when unset.
 */
export function expandEnvVars(text: string, env: NodeJS.ProcessEnv = process.env): string {
  return text.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, name: string) => env[name] ?? '')
}

export function parseConfig(text: string, source: string, env: NodeJS.ProcessEnv = process.env): LocatorConfig {
  let raw: unknown
  try {
    raw = parse(expandEnvVars(text, env))
  } catch (error) {
    throw new Error(`Failed to parse config ${source}: ${error instanceof Error ? error.message : String(error)}`, { cause: error })
  }

  const result = LocatorConfigSchema.safeParse(raw ?? {})
  if (!result.success) {
    const details = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new Error(`Invalid config ${source}: ${details}`)
  }
  return result.data
}

/**
 * Load configuration. An explicit path must exist; the default path is
 * optional and falls back to built-in defaults.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): LocatorConfig {
  const path = configPath ?? getDefaultConfigPath()

  if (!existsSync(path)) {
    if (configPath) {
      throw new Error(`Config file not found: ${configPath}`)
    }
    return LocatorConfigSchema.parse({})
  }

  return parseConfig(readFileSync(path, 'utf-8'), path, env)
}
