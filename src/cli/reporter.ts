import pino, {type DestinationStream, type Logger} from 'pino'
import chalk, {type ChalkInstance} from 'chalk'
import type {FieldError} from '../field-error.js'

/**
 * Discriminated union of validation run events.
 *
 * Lifecycle:
 * 1. For each file, either FILE_FAILED (unreadable or malformed) or, for each
 *    task it holds, TASK_VALID or TASK_INVALID
 * 2. RUN_FINISHED with the totals, also emitted when a fail-fast run stops early
 */
export type TaskValidEvent = {
  event: 'TASK_VALID';
  file: string;
  task: string;
}

export type TaskInvalidEvent = {
  event: 'TASK_INVALID';
  file: string;
  task: string;
  error: FieldError;
}

export type FileFailedEvent = {
  event: 'FILE_FAILED';
  file: string;
  message: string;
}

export type RunFinishedEvent = {
  event: 'RUN_FINISHED';
  valid: number;
  invalid: number;
  failedFiles: number;
}

export type ValidationEvent =
  | TaskValidEvent
  | TaskInvalidEvent
  | FileFailedEvent
  | RunFinishedEvent

export type Reporter = {
  emit(event: ValidationEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: Logger

  constructor(options?: {level?: string; destination?: DestinationStream}) {
    const level = options?.level ?? 'info'
    this.logger = options?.destination ? pino({level}, options.destination) : pino({level})
  }

  emit(event: ValidationEvent): void {
    switch (event.event) {
      case 'TASK_INVALID': {
        this.logger.warn({...event, error: event.error.toJSON()}, event.error.message)
        break
      }

      case 'FILE_FAILED': {
        this.logger.error(event, event.message)
        break
      }

      case 'TASK_VALID':
      case 'RUN_FINISHED': {
        this.logger.info(event)
        break
      }
    }
  }
}

/**
 * Reporter with colored, human-readable output.
 * Suitable for local development and pre-commit hooks.
 */
export class InteractiveReporter implements Reporter {
  private readonly colors: ChalkInstance
  private readonly write: (line: string) => void

  constructor(options?: {chalk?: ChalkInstance; write?: (line: string) => void}) {
    this.colors = options?.chalk ?? chalk
    this.write = options?.write ?? (line => {
      console.log(line)
    })
  }

  emit(event: ValidationEvent): void {
    const {colors} = this
    switch (event.event) {
      case 'TASK_VALID': {
        this.write(`${colors.green('✓')} ${event.file} ${colors.cyan(event.task)}`)
        break
      }

      case 'TASK_INVALID': {
        this.write(`${colors.red('✗')} ${event.file} ${colors.cyan(event.task)}`)
        for (const line of event.error.message.split('\n')) {
          this.write(colors.red(`    ${line}`))
        }

        break
      }

      case 'FILE_FAILED': {
        this.write(`${colors.red('✗')} ${event.message}`)
        break
      }

      case 'RUN_FINISHED': {
        this.write('')
        this.write(colors.bold(formatSummary(event)))
        break
      }
    }
  }
}

export function formatSummary({valid, invalid, failedFiles}: RunFinishedEvent): string {
  const parts = [`${valid} valid`, `${invalid} invalid`]
  if (failedFiles > 0) {
    parts.push(`${failedFiles} unreadable file${failedFiles > 1 ? 's' : ''}`)
  }

  return parts.join(', ')
}
