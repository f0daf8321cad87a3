// src/commands/init.ts
import { Command } from 'commander'
import chalk from 'chalk'
import { initConfig } from '../config/init.js'

export const initCommand = new Command('init')
  .description('Create a default configuration file')
  .option('-f, --force', 'Overwrite an existing configuration file')
  .action((options: { force?: boolean }) => {
    try {
      const path = initConfig(undefined, !!options.force)
      console.log(chalk.green(`\n✓ Config created at: ${path}`))
      console.log(chalk.dim('Edit this file to customize logging, scanning and report output.'))
    } catch (error) {
      if (error instanceof Error) {
        console.error(chalk.red(`Error: ${error.message}`))
      }
      process.exit(1)
    }
  })
