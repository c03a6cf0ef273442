import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import type {ParamSpec, Step, TaskSpec} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'taskcheck-test-'))
}

export function makeStep(overrides: Partial<Step> = {}): Step {
  return {image: 'busybox', ...overrides}
}

export function makeSpec(overrides: Partial<TaskSpec> = {}): TaskSpec {
  return {steps: [makeStep()], ...overrides}
}

export function arrayParam(name: string): ParamSpec {
  return {name, type: 'array'}
}

export function stringParam(name: string): ParamSpec {
  return {name, type: 'string'}
}
