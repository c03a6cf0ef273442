import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {createTmpDir} from '../../__tests__/helpers.js'
import {validateFiles} from '../commands/validate.js'
import type {Reporter, ValidationEvent} from '../reporter.js'

class RecordingReporter implements Reporter {
  readonly events: ValidationEvent[] = []

  emit(event: ValidationEvent): void {
    this.events.push(event)
  }

  get kinds(): string[] {
    return this.events.map(event => event.event)
  }
}

const validTask = `
kind: Task
metadata:
  name: greet
spec:
  params:
    - name: who
  steps:
    - image: alpine
      args: [echo, "hello $(params.who)"]
`

const invalidTask = `
kind: Task
metadata:
  name: splice
spec:
  params:
    - name: files
      type: array
  steps:
    - image: alpine
      command: ["ls-$(params.files)"]
`

async function writeTasks(files: Record<string, string>): Promise<string[]> {
  const dir = await createTmpDir()
  const paths: string[] = []
  for (const [name, content] of Object.entries(files)) {
    const filePath = join(dir, name)
    await writeFile(filePath, content, 'utf8')
    paths.push(filePath)
  }

  return paths
}

test('validateFiles reports each task and a summary', async t => {
  const files = await writeTasks({'valid.yaml': validTask, 'invalid.yaml': invalidTask})
  const reporter = new RecordingReporter()
  const summary = await validateFiles(files, reporter)

  t.deepEqual(summary, {valid: 1, invalid: 1, failedFiles: 0})
  t.deepEqual(reporter.kinds, ['TASK_VALID', 'TASK_INVALID', 'RUN_FINISHED'])

  const invalid = reporter.events[1]
  if (invalid?.event !== 'TASK_INVALID') {
    t.fail('expected an invalid task event')
    return
  }

  t.is(invalid.task, 'splice')
  t.is(invalid.file, files[1])
  t.is(invalid.error.kind, 'ILLEGAL_ARRAY_SPLICE')
  t.deepEqual(invalid.error.paths, ['taskspec.steps.command[0]'])
})

test('validateFiles names unnamed tasks by document index', async t => {
  const files = await writeTasks({'tasks.yaml': `${validTask}\n---\nkind: Task\nspec:\n  steps:\n    - image: alpine\n`})
  const reporter = new RecordingReporter()
  await validateFiles(files, reporter)
  t.deepEqual(reporter.events.slice(0, 2), [
    {event: 'TASK_VALID', file: files[0], task: 'greet'},
    {event: 'TASK_VALID', file: files[0], task: '<document 1>'}
  ])
})

test('validateFiles counts unreadable files and carries on', async t => {
  const files = await writeTasks({'broken.json': '{', 'valid.yaml': validTask})
  const reporter = new RecordingReporter()
  const summary = await validateFiles(files, reporter)

  t.deepEqual(summary, {valid: 1, invalid: 0, failedFiles: 1})
  t.deepEqual(reporter.events[0], {event: 'FILE_FAILED', file: files[0], message: `${files[0]}: invalid JSON`})
})

test('validateFiles stops at the first invalid task with failFast', async t => {
  const files = await writeTasks({'invalid.yaml': invalidTask, 'valid.yaml': validTask})
  const reporter = new RecordingReporter()
  const summary = await validateFiles(files, reporter, {failFast: true})

  t.deepEqual(summary, {valid: 0, invalid: 1, failedFiles: 0})
  t.deepEqual(reporter.kinds, ['TASK_INVALID', 'RUN_FINISHED'])
})

test('validateFiles stops at the first unreadable file with failFast', async t => {
  const files = await writeTasks({'broken.json': '[', 'valid.yaml': validTask})
  const reporter = new RecordingReporter()
  const summary = await validateFiles(files, reporter, {failFast: true})

  t.deepEqual(summary, {valid: 0, invalid: 0, failedFiles: 1})
  t.deepEqual(reporter.kinds, ['FILE_FAILED', 'RUN_FINISHED'])
})

test('validateFiles ends with the totals', async t => {
  const reporter = new RecordingReporter()
  await validateFiles([], reporter)
  t.deepEqual(reporter.events, [{event: 'RUN_FINISHED', valid: 0, invalid: 0, failedFiles: 0}])
})

test('validateFiles reports a file without tasks as failed', async t => {
  const files = await writeTasks({'typo.yaml': 'kind: task\nspec:\n  steps: []\n'})
  const reporter = new RecordingReporter()
  const summary = await validateFiles(files, reporter)

  t.deepEqual(summary, {valid: 0, invalid: 0, failedFiles: 1})
  t.deepEqual(reporter.events[0], {
    event: 'FILE_FAILED',
    file: files[0],
    message: `${files[0]}: no Task or ClusterTask document found`
  })
})
