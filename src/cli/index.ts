#!/usr/bin/env node
import 'dotenv/config'
import {Command} from 'commander'
import {registerValidateCommand} from './commands/validate.js'

async function main() {
  const program = new Command()

  program
    .name('taskcheck')
    .description('Validate task definitions before they are accepted for execution')
    .version('0.1.0')
    .option('--json', 'Output structured JSON logs')
    .option('-c, --config <path>', 'Config file (default: ./.taskcheck.yml)')

  registerValidateCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  console.error('Fatal error:', error)
  throw error
}
