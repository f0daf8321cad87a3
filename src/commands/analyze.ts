// src/commands/analyze.ts
import { Command } from 'commander'
import chalk from 'chalk'
import ora from 'ora'
import { readFileSync, writeFileSync } from 'fs'
import { marked } from 'marked'
import { markedTerminal } from 'marked-terminal'
import { loadConfig } from '../config/loader.js'
import type { LocatorConfig } from '../config/types.js'
import { createLogger, LOG_LEVELS } from '../logger/index.js'
import type { LogLevel } from '../logger/index.js'
import { FeatureLocator } from '../locator/locator.js'
import { buildReport, createReporter } from '../reporter/index.js'
import type { ReportFormat } from '../reporter/index.js'
import type { Locale } from '../project/types.js'

marked.use(markedTerminal({
  reflowText: true,
  width: 80
}))

export interface AnalyzeOptions {
  requirement?: string
  requirementFile?: string
  verify?: boolean
  format?: string
  locale?: string
  output?: string
  config?: string
  logLevel?: string
}

/**
 * Read the requirement from exactly one of --requirement or --requirement-file.
 */
export function resolveRequirement(
  options: Pick<AnalyzeOptions, 'requirement' | 'requirementFile'>,
  readFile: (path: string) => string = path => readFileSync(path, 'utf-8')
): string {
  if (options.requirement !== undefined && options.requirementFile !== undefined) {
    throw new Error('Use either --requirement or --requirement-file, not both')
  }

  const text = options.requirementFile !== undefined
    ? readFile(options.requirementFile)
    : options.requirement

  if (text === undefined) {
    throw new Error('A requirement is needed: pass --requirement <text> or --requirement-file <path>')
  }
  if (text.trim() === '') {
    throw new Error('Requirement is empty')
  }
  return text
}

function isReportFormat(value: string): value is ReportFormat {
  return value === 'markdown' || value === 'json'
}

function isLocale(value: string): value is Locale {
  return value === 'zh' || value === 'en'
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value)
}

/**
 * Apply command-line overrides on top of the loaded configuration.
 */
export function applyCliOverrides(config: LocatorConfig, options: AnalyzeOptions): LocatorConfig {
  const result: LocatorConfig = {
    logging: { ...config.logging },
    scan: { ...config.scan },
    report: { ...config.report }
  }

  if (options.format !== undefined) {
    if (!isReportFormat(options.format)) {
      throw new Error(`Unknown format "${options.format}" (expected markdown or json)`)
    }
    result.report.format = options.format
  }
  if (options.locale !== undefined) {
    if (!isLocale(options.locale)) {
      throw new Error(`Unknown locale "${options.locale}" (expected zh or en)`)
    }
    result.report.locale = options.locale
  }
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      throw new Error(`Unknown log level "${options.logLevel}" (expected ${LOG_LEVELS.join(', ')})`)
    }
    result.logging.level = options.logLevel
  }
  if (options.verify) {
    result.report.verify = true
  }

  return result
}

export const analyzeCommand = new Command('analyze')
  .description('Locate candidate functions for each feature described in a requirement')
  .argument('<dir>', 'Directory containing the extracted source tree')
  .option('-r, --requirement <text>', 'Requirement text')
  .option('--requirement-file <path>', 'Read the requirement from a file')
  .option('--verify', 'Include generated test code and the simulated verification result')
  .option('-f, --format <format>', 'Output format (markdown|json)')
  .option('-l, --locale <locale>', 'Language of run and test suggestions (zh|en)')
  .option('-o, --output <file>', 'Output to file instead of stdout')
  .option('-c, --config <path>', 'Path to config file')
  .option('--log-level <level>', 'Log level (debug|info|warn|error)')
  .action(async (dir: string, options: AnalyzeOptions) => {
    const spinner = ora('Loading configuration...').start()

    try {
      const config = applyCliOverrides(loadConfig(options.config), options)
      const requirement = resolveRequirement(options)
      spinner.succeed('Configuration loaded')

      const logger = createLogger(config.logging)

      spinner.start(`Scanning ${dir}...`)
      const locator = new FeatureLocator(dir, {
        scan: config.scan,
        locale: config.report.locale,
        logger
      })
      const stats = locator.getStats()
      spinner.succeed(`Scanned ${stats.totalFiles} source files (${stats.totalLines} lines)`)

      spinner.start('Analyzing features...')
      const report = buildReport(locator, requirement, { verify: config.report.verify })
      const located = report.featureAnalysis.filter(f => f.locations.length > 0).length
      spinner.succeed(`Analyzed ${report.featureAnalysis.length} features, ${located} located`)

      const output = createReporter(config.report.format).generate(report)

      if (options.output) {
        writeFileSync(options.output, output, 'utf-8')
        console.log(chalk.green(`\n✓ Report saved to: ${options.output}`))
      } else if (config.report.format === 'markdown' && process.stdout.isTTY) {
        console.log(marked.parse(output, { async: false }))
      } else {
        console.log(output)
      }
    } catch (error) {
      spinner.fail('Analysis failed')
      if (error instanceof Error) {
        console.error(chalk.red(`Error: ${error.message}`))
      }
      process.exit(1)
    }
  })
