#!/usr/bin/env node
import { Command } from 'commander'
import { prepareCommand } from './commands/prepare.js'
import { resolveCommand } from './commands/resolve.js'
import { genericsCommand } from './commands/generics.js'
import { statusCommand } from './commands/status.js'

const program = new Command()

program
  .name('hdlprep')
  .description('Configuration and manifest compiler for HDL projects')
  .version('0.1.0')

program
  .command('prepare <config>')
  .description('Resolve configuration and compile order into a build plan')
  .requiredOption('--compile-order <file>', 'Compile order manifest (JSON)')
  .option('--mode <mode>', 'Operation mode: open, build, export', 'build')
  .option('--output <dir>', 'Output directory (default: <config dir>/.hdlprep/<mode>)')
  .option('--cores <n>', 'Cores available to the backend', '4')
  .option('--json', 'Print the run summary as JSON')
  .action(async (config, options) => {
    const result = await prepareCommand(config, options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    } else if (!result.value.passed) {
      process.exit(1)
    }
  })

program
  .command('resolve <config>')
  .description('Print the resolved project configuration')
  .option('--json', 'Output as JSON')
  .option('--no-setup', 'Do not run environment_setup scripts')
  .action(async (config, options) => {
    const result = await resolveCommand(config, options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

program
  .command('generics <config>')
  .description('Print the encoded top-level generic arguments')
  .action(async (config) => {
    const result = await genericsCommand(config)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    }
  })

program
  .command('status <log>')
  .description('Summarize the step markers of a captured build log')
  .option('--json', 'Output as JSON')
  .action(async (log, options) => {
    const result = await statusCommand(log, options)
    if (!result.ok) {
      console.error(`Error: ${result.error}`)
      process.exit(1)
    } else if (!result.value.passed) {
      process.exit(1)
    }
  })

program.parse()
