import test from 'ava'
import {Chalk} from 'chalk'
import {missingField} from '../../field-error.js'
import {ConsoleReporter, InteractiveReporter, formatSummary} from '../reporter.js'

function collectLogs(): {lines: string[]; reporter: ConsoleReporter} {
  const lines: string[] = []
  const reporter = new ConsoleReporter({
    level: 'info',
    destination: {
      write(message: string) {
        lines.push(message)
      }
    }
  })
  return {lines, reporter}
}

function collectOutput(): {lines: string[]; reporter: InteractiveReporter} {
  const lines: string[] = []
  const reporter = new InteractiveReporter({
    chalk: new Chalk({level: 0}),
    write(line) {
      lines.push(line)
    }
  })
  return {lines, reporter}
}

// -- ConsoleReporter -------------------------------------------------------------

test('ConsoleReporter logs an invalid task as a warning', t => {
  const {lines, reporter} = collectLogs()
  reporter.emit({event: 'TASK_INVALID', file: 'task.yaml', task: 'build', error: missingField('steps')})
  t.is(lines.length, 1)

  const entry: unknown = JSON.parse(lines[0] ?? '')
  t.like(entry, {
    level: 40,
    msg: 'missing field(s): steps',
    event: 'TASK_INVALID',
    file: 'task.yaml',
    task: 'build',
    error: {kind: 'MISSING_REQUIRED_FIELD', reason: 'missing field(s)', paths: ['steps']}
  })
})

test('ConsoleReporter logs an unreadable file as an error', t => {
  const {lines, reporter} = collectLogs()
  reporter.emit({event: 'FILE_FAILED', file: 'x.json', message: 'x.json: invalid JSON'})
  const entry: unknown = JSON.parse(lines[0] ?? '')
  t.like(entry, {level: 50, msg: 'x.json: invalid JSON', file: 'x.json'})
})

test('ConsoleReporter logs the run summary', t => {
  const {lines, reporter} = collectLogs()
  reporter.emit({event: 'RUN_FINISHED', valid: 2, invalid: 0, failedFiles: 0})
  const entry: unknown = JSON.parse(lines[0] ?? '')
  t.like(entry, {level: 30, event: 'RUN_FINISHED', valid: 2, invalid: 0, failedFiles: 0})
})

test('ConsoleReporter respects the level', t => {
  const lines: string[] = []
  const reporter = new ConsoleReporter({
    level: 'warn',
    destination: {
      write(message: string) {
        lines.push(message)
      }
    }
  })
  reporter.emit({event: 'TASK_VALID', file: 'task.yaml', task: 'build'})
  t.is(lines.length, 0)
})

// -- InteractiveReporter ---------------------------------------------------------

test('InteractiveReporter prints a valid task', t => {
  const {lines, reporter} = collectOutput()
  reporter.emit({event: 'TASK_VALID', file: 'task.yaml', task: 'build'})
  t.deepEqual(lines, ['✓ task.yaml build'])
})

test('InteractiveReporter prints each line of the error indented', t => {
  const {lines, reporter} = collectOutput()
  const error = missingField('steps')
  reporter.emit({event: 'TASK_INVALID', file: 'task.yaml', task: 'build', error})
  t.deepEqual(lines, ['✗ task.yaml build', '    missing field(s): steps'])
})

test('InteractiveReporter prints file failures and the summary', t => {
  const {lines, reporter} = collectOutput()
  reporter.emit({event: 'FILE_FAILED', file: 'x.json', message: 'x.json: invalid JSON'})
  reporter.emit({event: 'RUN_FINISHED', valid: 1, invalid: 0, failedFiles: 1})
  t.deepEqual(lines, ['✗ x.json: invalid JSON', '', '1 valid, 0 invalid, 1 unreadable file'])
})

test('formatSummary pluralizes unreadable files', t => {
  t.is(formatSummary({event: 'RUN_FINISHED', valid: 0, invalid: 3, failedFiles: 2}), '0 valid, 3 invalid, 2 unreadable files')
  t.is(formatSummary({event: 'RUN_FINISHED', valid: 4, invalid: 1, failedFiles: 0}), '4 valid, 1 invalid')
})
