import type {FieldError} from '../field-error.js'
import type {Inputs, Outputs, ParamSpec, Step, TaskResources} from '../types.js'
import {buildParamNamespace, buildResourceNamespace} from './namespace.js'
import {
  findNonIsolatedArrayUse,
  findProhibitedArrayUse,
  findUndeclared,
  legacyParamScope,
  legacyResourceScope,
  paramScope,
  resourceScope
} from './substitution.js'

/** Checks one field value; `field` is the path segment under `taskspec.steps`. */
type FieldCheck = (field: string, value: string) => FieldError | undefined

/**
 * Runs checks over the string fields of each step, in a fixed order, and
 * returns the first error. Command and args tokens get `tokenCheck`, every
 * other field gets `fieldCheck`.
 */
function walkStepFields(steps: Step[], fieldCheck: FieldCheck, tokenCheck: FieldCheck = fieldCheck): FieldError | undefined {
  for (const step of steps) {
    const error = fieldCheck('name', step.name ?? '')
      ?? fieldCheck('image', step.image ?? '')
      ?? fieldCheck('workingDir', step.workingDir ?? '')
      ?? firstError(step.command ?? [], (cmd, i) => tokenCheck(`command[${i}]`, cmd))
      ?? firstError(step.args ?? [], (arg, i) => tokenCheck(`arg[${i}]`, arg))
      ?? firstError(step.env ?? [], env => fieldCheck(`env[${env.name}]`, env.value ?? ''))
      ?? firstError(step.volumeMounts ?? [], (vm, i) => fieldCheck(`volumeMount[${i}].Name`, vm.name)
        ?? fieldCheck(`volumeMount[${i}].MountPath`, vm.mountPath)
        ?? fieldCheck(`volumeMount[${i}].SubPath`, vm.subPath ?? ''))
    if (error) {
      return error
    }
  }

  return undefined
}

function firstError<T>(items: T[], check: (item: T, index: number) => FieldError | undefined): FieldError | undefined {
  for (const [index, item] of items.entries()) {
    const error = check(item, index)
    if (error) {
      return error
    }
  }

  return undefined
}

/** Every placeholder of `scope` in every step field must name a variable in `names`. */
export function validateVariables(steps: Step[], scope: string, names: ReadonlySet<string>): FieldError | undefined {
  return walkStepFields(steps, (field, value) => findUndeclared(field, value, scope, names))
}

/**
 * Array variables may only stand alone as a whole command or args token;
 * referencing them from any other field is rejected.
 */
export function validateArrayUsage(steps: Step[], scope: string, arrays: ReadonlySet<string>): FieldError | undefined {
  return walkStepFields(
    steps,
    (field, value) => findProhibitedArrayUse(field, value, scope, arrays),
    (field, value) => findNonIsolatedArrayUse(field, value, scope, arrays)
  )
}

/** Checks `$(params.*)` references against the `params` list. */
export function validateParameterVariables(steps: Step[], params?: ParamSpec[]): FieldError | undefined {
  const {names, arrays} = buildParamNamespace(params)
  return validateVariables(steps, paramScope, names)
    ?? validateArrayUsage(steps, paramScope, arrays)
}

/**
 * Checks legacy `$(inputs.params.*)` references. Both declaration lists are
 * visible through the legacy syntax.
 */
export function validateLegacyParameterVariables(steps: Step[], inputs?: Inputs, params?: ParamSpec[]): FieldError | undefined {
  const {names, arrays} = buildParamNamespace(params, inputs?.params)
  return validateVariables(steps, legacyParamScope, names)
    ?? validateArrayUsage(steps, legacyParamScope, arrays)
}

/** Checks `$(resources.inputs.*)` and `$(resources.outputs.*)` references. */
export function validateResourceVariables(steps: Step[], resources?: TaskResources): FieldError | undefined {
  if (!resources) {
    return undefined
  }

  const {names} = buildResourceNamespace(resources)
  return validateVariables(steps, resourceScope, names)
}

/** Checks legacy `$(inputs.resources.*)` and `$(outputs.resources.*)` references. */
export function validateLegacyResourceVariables(
  steps: Step[],
  inputs?: Inputs,
  outputs?: Outputs,
  resources?: TaskResources
): FieldError | undefined {
  const {names} = buildResourceNamespace(resources, inputs, outputs)
  return validateVariables(steps, legacyResourceScope, names)
}
