import {unionBy} from 'lodash-es'
import type {Container, Step} from '../types.js'

/**
 * Applies the step template to one step. Fields the step leaves unset or
 * empty come from the template; `env` merges by variable name and
 * `volumeMounts` by mount path, the step's entries winning.
 */
export function mergeStepWithTemplate(template: Container, step: Step): Step {
  return {
    ...step,
    image: step.image || template.image,
    workingDir: step.workingDir || template.workingDir,
    command: nonEmpty(step.command) ?? template.command,
    args: nonEmpty(step.args) ?? template.args,
    env: mergeList(step.env, template.env, 'name'),
    volumeMounts: mergeList(step.volumeMounts, template.volumeMounts, 'mountPath')
  }
}

/** Returns new step objects; neither the template nor the steps are modified. */
export function mergeStepsWithStepTemplate(template: Container | undefined, steps: Step[]): Step[] {
  if (!template) {
    return steps
  }

  return steps.map(step => mergeStepWithTemplate(template, step))
}

function nonEmpty(list?: string[]): string[] | undefined {
  return list && list.length > 0 ? list : undefined
}

function mergeList<T>(stepItems: T[] | undefined, templateItems: T[] | undefined, key: keyof T & string): T[] | undefined {
  if (!stepItems && !templateItems) {
    return undefined
  }

  return unionBy(stepItems ?? [], templateItems ?? [], key)
}
