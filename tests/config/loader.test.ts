// tests/config/loader.test.ts
import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtemp, rm } from 'fs/promises'
import { writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { expandEnvVars, getDefaultConfigPath, loadConfig, parseConfig } from '../../src/config/loader.js'

describe('expandEnvVars', () => {
  it('should substitute set variables and blank unset ones', () => {
    expect(expandEnvVars('${A}/x/${B}', { A: 'root' })).toBe('root/x/')
  })
})

describe('parseConfig', () => {
  it('should fill defaults for an empty document', () => {
    expect(parseConfig('', 'test.yaml')).toEqual({
      logging: { level: 'warn', sink: 'console' },
      scan: { ignore: [], maxFiles: 20000, maxFileBytes: 5242880 },
      report: { format: 'markdown', locale: 'zh', verify: false }
    })
  })

  it('should merge partial sections with defaults', () => {
    const config = parseConfig('scan:\n  ignore: [node_modules, dist]\nreport:\n  locale: en\n', 'test.yaml')
    expect(config.scan).toEqual({ ignore: ['node_modules', 'dist'], maxFiles: 20000, maxFileBytes: 5242880 })
    expect(config.report).toEqual({ format: 'markdown', locale: 'en', verify: false })
  })

  it('should expand environment variables before parsing', () => {
    const config = parseConfig(
      'logging:\n  sink: file\n  file: ${LOG_DIR}/app.log\n',
      'test.yaml',
      { LOG_DIR: '/var/log/locator' }
    )
    expect(config.logging.file).toBe('/var/log/locator/app.log')
  })

  it('should reject unknown enum values', () => {
    expect(() => parseConfig('report:\n  format: html\n', 'test.yaml')).toThrow(/Invalid config test\.yaml: report\.format/)
  })

  it('should require a file for the file sink', () => {
    expect(() => parseConfig('logging:\n  sink: file\n', 'test.yaml')).toThrow(/logging\.file/)
  })

  it('should report YAML syntax errors with the source', () => {
    expect(() => parseConfig('scan: [unclosed', 'broken.yaml')).toThrow(/Failed to parse config broken\.yaml/)
  })
})

describe('loadConfig', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'feature-locator-config-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('should read an explicit config file', () => {
    const path = join(dir, 'config.yaml')
    writeFileSync(path, 'report:\n  verify: true\n')
    expect(loadConfig(path).report.verify).toBe(true)
  })

  it('should fail when an explicit config file is missing', () => {
    expect(() => loadConfig(join(dir, 'missing.yaml'))).toThrow('Config file not found')
  })

  it('should place the default config under the base directory', () => {
    expect(getDefaultConfigPath('/home/test')).toBe('/home/test/.feature-locator/config.yaml')
  })
})
