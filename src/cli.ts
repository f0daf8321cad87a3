#!/usr/bin/env node
import { Command } from 'commander'
import { analyzeCommand } from './commands/analyze.js'
import { initCommand } from './commands/init.js'

const program = new Command()

program
  .name('feature-locator')
  .description('Map requirement features to candidate functions in a source tree')
  .version('0.1.0')

program.addCommand(analyzeCommand)
program.addCommand(initCommand)

await program.parseAsync()
