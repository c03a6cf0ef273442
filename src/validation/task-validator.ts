import {currentField, missingField, type FieldError} from '../field-error.js'
import type {Task, TaskSpec} from '../types.js'
import {mergeStepsWithStepTemplate} from './step-template.js'
import {
  checkForDuplicates,
  validateDeclarationGroups,
  validateDeclaredWorkspaces,
  validateParameterTypes,
  validateResourceType,
  validateStepNames,
  validateSteps,
  validateTaskResources,
  validateVolumes
} from './structure.js'
import {
  validateLegacyParameterVariables,
  validateLegacyResourceVariables,
  validateParameterVariables,
  validateResourceVariables
} from './variables.js'

/**
 * Stage a validation pass reports. A failing pass names the last stage it
 * completed: `MetadataChecked` when a structural check fails, `NamespaceBuilt`
 * when a variable check fails. A passing pass ends at `Valid`.
 */
export type ValidationStage =
  | 'MetadataChecked'
  | 'NamespaceBuilt'
  | 'Valid'

export type ValidationResult =
  | {ok: true; stage: 'Valid'}
  | {ok: false; error: FieldError; stage: Exclude<ValidationStage, 'Valid'>}

/**
 * Validates a task spec and returns the first error found, if any.
 * The spec is only read. Object metadata is not checked here.
 */
export function validateTaskSpec(spec: TaskSpec): FieldError | undefined {
  const result = validate(spec)
  return result.ok ? undefined : result.error
}

/**
 * Validates a whole task. Metadata rules belong to the caller, so this is the
 * spec check under another name; error paths are not re-anchored.
 */
export function validateTask(task: Task): FieldError | undefined {
  return validateTaskSpec(task.spec)
}

export function validate(spec: TaskSpec): ValidationResult {
  // Metadata belongs to the caller; the pass starts past it.
  const structural = checkStructure(spec)
  if (structural) {
    return {ok: false, error: structural, stage: 'MetadataChecked'}
  }

  // Namespaces are built per driver from the declarations checked above.
  const variables = checkVariables(spec)
  if (variables) {
    return {ok: false, error: variables, stage: 'NamespaceBuilt'}
  }

  return {ok: true, stage: 'Valid'}
}

function checkStructure(spec: TaskSpec): FieldError | undefined {
  if (isEmptySpec(spec)) {
    return missingField(currentField)
  }

  const steps = spec.steps ?? []
  if (steps.length === 0) {
    return missingField('steps')
  }

  const mergedSteps = mergeStepsWithStepTemplate(spec.stepTemplate, steps)

  return validateVolumes(spec.volumes)?.viaField('volumes')
    ?? validateDeclaredWorkspaces(spec.workspaces, steps, spec.stepTemplate)
    ?? validateSteps(mergedSteps)?.viaField('steps')
    ?? validateDeclarationGroups(spec)
    ?? validateTaskResources(spec.resources)
    ?? validateParameterTypes(spec.params)
    ?? checkLegacyDeclarations(spec)
    ?? validateStepNames(steps)
}

function checkLegacyDeclarations({inputs, outputs}: TaskSpec): FieldError | undefined {
  if (inputs) {
    const inputResources = inputs.resources ?? []
    for (const resource of inputResources) {
      const error = validateResourceType(resource, `taskspec.Inputs.Resources.${resource.name}.Type`)
      if (error) {
        return error
      }
    }

    const error = checkForDuplicates(inputResources, 'taskspec.Inputs.Resources.Name')
      ?? validateParameterTypes(inputs.params, 'taskspec.inputs.params')
    if (error) {
      return error
    }
  }

  if (outputs) {
    const outputResources = outputs.resources ?? []
    for (const resource of outputResources) {
      const error = validateResourceType(resource, `taskspec.Outputs.Resources.${resource.name}.Type`)
      if (error) {
        return error
      }
    }

    return checkForDuplicates(outputResources, 'taskspec.Outputs.Resources.Name')
  }

  return undefined
}

function checkVariables(spec: TaskSpec): FieldError | undefined {
  const steps = spec.steps ?? []
  return validateParameterVariables(steps, spec.params)
    ?? validateLegacyParameterVariables(steps, spec.inputs, spec.params)
    ?? validateResourceVariables(steps, spec.resources)
    ?? validateLegacyResourceVariables(steps, spec.inputs, spec.outputs, spec.resources)
}

/** True when no field carries a value; empty lists count as unset. */
function isEmptySpec(spec: TaskSpec): boolean {
  return Object.values(spec).every(value => value === undefined || value === null || (Array.isArray(value) && value.length === 0))
}
