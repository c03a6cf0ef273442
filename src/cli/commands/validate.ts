import process from 'node:process'
import type {Command} from 'commander'
import {DocumentError} from '../../errors.js'
import {TaskLoader} from '../../task-loader.js'
import type {Task} from '../../types.js'
import {validateTask} from '../../validation/task-validator.js'
import {loadConfig} from '../config.js'
import {ConsoleReporter, InteractiveReporter, type Reporter, type RunFinishedEvent} from '../reporter.js'
import {getGlobalOptions} from '../utils.js'

export type ValidateOptions = {
  /** Stop at the first invalid task or unreadable file. */
  failFast?: boolean;
}

export type ValidateSummary = Omit<RunFinishedEvent, 'event'>

/**
 * Loads and validates every task in the given files, reporting each result.
 * Files are processed in order. A file that cannot be loaded, or holds no
 * task, counts as failed and is skipped.
 */
export async function validateFiles(
  files: string[],
  reporter: Reporter,
  options: ValidateOptions = {},
  loader = new TaskLoader()
): Promise<ValidateSummary> {
  const summary: ValidateSummary = {valid: 0, invalid: 0, failedFiles: 0}

  for (const file of files) {
    const stop = await validateFile(file, reporter, loader, summary, options)
    if (stop) {
      break
    }
  }

  reporter.emit({event: 'RUN_FINISHED', ...summary})
  return summary
}

async function validateFile(
  file: string,
  reporter: Reporter,
  loader: TaskLoader,
  summary: ValidateSummary,
  options: ValidateOptions
): Promise<boolean> {
  let tasks: Task[]
  try {
    tasks = await loader.load(file)
  } catch (error: unknown) {
    if (!(error instanceof DocumentError)) {
      throw error
    }

    summary.failedFiles++
    reporter.emit({event: 'FILE_FAILED', file, message: error.message})
    return options.failFast === true
  }

  if (tasks.length === 0) {
    summary.failedFiles++
    reporter.emit({event: 'FILE_FAILED', file, message: `${file}: no Task or ClusterTask document found`})
    return options.failFast === true
  }

  for (const [index, task] of tasks.entries()) {
    const name = task.metadata.name ?? `<document ${index}>`
    const error = validateTask(task)
    if (error) {
      summary.invalid++
      reporter.emit({event: 'TASK_INVALID', file, task: name, error})
      if (options.failFast) {
        return true
      }
    } else {
      summary.valid++
      reporter.emit({event: 'TASK_VALID', file, task: name})
    }
  }

  return false
}

export function registerValidateCommand(program: Command): void {
  program
    .command('validate')
    .description('Validate task definitions')
    .argument('<files...>', 'Task files to validate (JSON or YAML)')
    .option('--fail-fast', 'Stop at the first invalid task')
    .action(async (files: string[], options: {failFast?: boolean}, cmd: Command) => {
      const {json, config: configPath} = getGlobalOptions(cmd)
      const config = await loadConfig(process.cwd(), configPath)

      const useJson = json ?? config.json ?? false
      const level = process.env.TASKCHECK_LOG_LEVEL ?? config.logLevel ?? 'info'
      const reporter = useJson ? new ConsoleReporter({level}) : new InteractiveReporter()

      const summary = await validateFiles(files, reporter, {failFast: options.failFast ?? config.failFast})
      if (summary.invalid > 0 || summary.failedFiles > 0) {
        process.exitCode = 1
      }
    })
}
