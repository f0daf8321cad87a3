// src/config/init.ts
import { writeFileSync, mkdirSync, existsSync } from 'fs'
import { dirname } from 'path'
import { getDefaultConfigPath } from './loader.js'

export const DEFAULT_CONFIG = `# Feature Locator Configuration

# Logging goes to stderr (console), a file, or nowhere (silent)
logging:
  level: warn        # debug | info | warn | error
  sink: console      # console | file | silent
  # file: \${HOME}/.feature-locator/feature-locator.log

# Source scanning
scan:
  # Directory names or *.ext patterns to skip, e.g. node_modules
  ignore: []
  maxFiles: 20000
  maxFileBytes: 5242880

# Report output
report:
  format: markdown   # markdown | json
  locale: zh         # zh | en, language of the run and test suggestions
  verify: false      # include generated test code and the simulated result
`

export function initConfig(baseDir?: string, force = false): string {
  const configPath = getDefaultConfigPath(baseDir)

  if (existsSync(configPath) && !force) {
    throw new Error(`Config already exists: ${configPath}`)
  }

  mkdirSync(dirname(configPath), { recursive: true })
  writeFileSync(configPath, DEFAULT_CONFIG, 'utf-8')

  return configPath
}
