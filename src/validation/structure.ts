import {posix} from 'node:path'
import {FieldError, invalidValue, missingField, multipleOneOf} from '../field-error.js'
import {
  allowedReservedMountPath,
  isParamType,
  isResourceType,
  reservedMountPrefix,
  reservedVolumePrefix,
  workspaceMountPath,
  type Container,
  type ParamSpec,
  type Step,
  type TaskResource,
  type TaskResources,
  type TaskSpec,
  type Volume,
  type WorkspaceDeclaration
} from '../types.js'

const dns1123LabelMaxLength = 63
const dns1123LabelPattern = /^[a-z\d]([-a-z\d]*[a-z\d])?$/

const stepNameDetails = 'Task step name must be a valid DNS Label, For more info refer to https://kubernetes.io/docs/concepts/overview/working-with-objects/names/#names'

export function isDns1123Label(value: string): boolean {
  return value.length <= dns1123LabelMaxLength && dns1123LabelPattern.test(value)
}

/**
 * Lexically cleans a mount path: collapses separators, resolves `.` and `..`
 * and drops the trailing slash, so `/data/` and `/data/./x/..` compare equal.
 */
export function cleanPath(path: string): string {
  const normalized = posix.normalize(path)
  return normalized.length > 1 && normalized.endsWith('/') ? normalized.slice(0, -1) : normalized
}

// -- Volumes and workspaces --------------------------------------------------

/** Volume names must be unique. Paths are relative to the volumes list. */
export function validateVolumes(volumes: Volume[] = []): FieldError | undefined {
  const seen = new Set<string>()
  for (const volume of volumes) {
    if (seen.has(volume.name)) {
      return new FieldError({
        kind: 'DUPLICATE_NAME',
        reason: `multiple volumes with same name ${JSON.stringify(volume.name)}`,
        paths: ['name']
      })
    }

    seen.add(volume.name)
  }

  return undefined
}

/**
 * Workspace names must be unique, and no workspace may be mounted where a
 * step, the step template, or an earlier workspace already mounts something.
 *
 * Step and template mount paths are collected first; workspaces are then
 * checked in declaration order, each accepted path joining the set.
 */
export function validateDeclaredWorkspaces(
  workspaces: WorkspaceDeclaration[] = [],
  steps: Step[] = [],
  stepTemplate?: Container
): FieldError | undefined {
  const mountPaths = new Set<string>()
  for (const step of steps) {
    for (const vm of step.volumeMounts ?? []) {
      mountPaths.add(cleanPath(vm.mountPath))
    }
  }

  for (const vm of stepTemplate?.volumeMounts ?? []) {
    mountPaths.add(cleanPath(vm.mountPath))
  }

  const names = new Set<string>()
  for (const workspace of workspaces) {
    if (names.has(workspace.name)) {
      return new FieldError({
        kind: 'DUPLICATE_NAME',
        reason: `workspace name ${JSON.stringify(workspace.name)} must be unique`,
        paths: ['workspaces.name']
      })
    }

    names.add(workspace.name)

    const mountPath = cleanPath(workspaceMountPath(workspace))
    if (mountPaths.has(mountPath)) {
      return new FieldError({
        kind: 'PATH_CONFLICT',
        reason: `workspace mount path ${JSON.stringify(mountPath)} must be unique`,
        paths: ['workspaces.mountpath']
      })
    }

    mountPaths.add(mountPath)
  }

  return undefined
}

// -- Steps -------------------------------------------------------------------

/**
 * Checks each step on its own and step names against each other. Expects
 * steps already merged with the step template; paths are relative to the
 * steps list.
 */
export function validateSteps(steps: Step[]): FieldError | undefined {
  const names = new Set<string>()
  for (const [idx, step] of steps.entries()) {
    if (!step.image) {
      return missingField('Image')
    }

    if (step.script && step.command && step.command.length > 0) {
      return new FieldError({
        kind: 'MUTUALLY_EXCLUSIVE_FIELDS',
        reason: `step ${idx} script cannot be used with command`,
        paths: ['script']
      })
    }

    if (step.name) {
      if (names.has(step.name)) {
        return invalidValue(step.name, 'name', 'DUPLICATE_NAME')
      }

      names.add(step.name)
    }

    for (const vm of step.volumeMounts ?? []) {
      if (vm.mountPath.startsWith(reservedMountPrefix) && !vm.mountPath.startsWith(allowedReservedMountPath)) {
        return new FieldError({
          kind: 'PATH_CONFLICT',
          reason: `step ${idx} volumeMount cannot be mounted under ${reservedMountPrefix} (volumeMount ${JSON.stringify(vm.name)} mounted at ${JSON.stringify(vm.mountPath)})`,
          paths: ['volumeMounts.mountPath']
        })
      }

      if (vm.name.startsWith(reservedVolumePrefix)) {
        return new FieldError({
          kind: 'INVALID_NAME_SYNTAX',
          reason: `step ${idx} volumeMount name ${JSON.stringify(vm.name)} cannot start with ${JSON.stringify(reservedVolumePrefix)}`,
          paths: ['volumeMounts.name']
        })
      }
    }
  }

  return undefined
}

/** Non-empty step names must be DNS-1123 labels. */
export function validateStepNames(steps: Step[]): FieldError | undefined {
  for (const step of steps) {
    if (step.name && !isDns1123Label(step.name)) {
      return new FieldError({
        kind: 'INVALID_NAME_SYNTAX',
        reason: `invalid value ${JSON.stringify(step.name)}`,
        paths: ['taskspec.steps.name'],
        details: stepNameDetails
      })
    }
  }

  return undefined
}

// -- Declarations ------------------------------------------------------------

/** A legacy block and its replacement cannot both be populated. */
export function validateDeclarationGroups(spec: TaskSpec): FieldError | undefined {
  const {inputs, outputs, resources} = spec
  if (isPopulated(inputs?.params) && isPopulated(spec.params)) {
    return multipleOneOf('inputs.params', 'params')
  }

  if (isPopulated(resources?.inputs) && isPopulated(inputs?.resources)) {
    return multipleOneOf('inputs.resources', 'resources.inputs')
  }

  if (isPopulated(resources?.outputs) && isPopulated(outputs?.resources)) {
    return multipleOneOf('outputs.resources', 'resources.outputs')
  }

  return undefined
}

function isPopulated(list?: unknown[]): boolean {
  return list !== undefined && list.length > 0
}

export function validateResourceType(resource: TaskResource, path: string): FieldError | undefined {
  return isResourceType(resource.type) ? undefined : invalidValue(resource.type, path, 'INVALID_ENUM_VALUE')
}

/** Resource names must be unique within a list, ignoring case. */
export function checkForDuplicates(resources: TaskResource[], path: string): FieldError | undefined {
  const encountered = new Set<string>()
  for (const resource of resources) {
    const key = resource.name.toLowerCase()
    if (encountered.has(key)) {
      return new FieldError({kind: 'DUPLICATE_NAME', reason: 'expected exactly one, got both', paths: [path]})
    }

    encountered.add(key)
  }

  return undefined
}

function validateResourceList(direction: 'inputs' | 'outputs', resources: TaskResource[] = []): FieldError | undefined {
  for (const resource of resources) {
    const error = validateResourceType(resource, `taskspec.resources.${direction}.${resource.name}.Type`)
    if (error) {
      return error
    }
  }

  return checkForDuplicates(resources, `taskspec.resources.${direction}.name`)
}

/** Type and uniqueness checks for the `resources` block. */
export function validateTaskResources(resources?: TaskResources): FieldError | undefined {
  if (!resources) {
    return undefined
  }

  return validateResourceList('inputs', resources.inputs)
    ?? validateResourceList('outputs', resources.outputs)
}

/** Declared type must be known, and a default's type must match it. */
export function validateParamType(param: ParamSpec, pathPrefix: string): FieldError | undefined {
  const typePath = `${pathPrefix}.${param.name}.type`
  if (!isParamType(param.type)) {
    return invalidValue(param.type, typePath, 'INVALID_ENUM_VALUE')
  }

  if (param.default && param.default.type !== param.type) {
    return new FieldError({
      kind: 'TYPE_MISMATCH',
      reason: `"${param.type}" type does not match default value's type: "${param.default.type}"`,
      paths: [typePath, `${pathPrefix}.${param.name}.default.type`]
    })
  }

  return undefined
}

/** Checks a parameter list; `pathPrefix` is where the list lives in the task spec. */
export function validateParameterTypes(params: ParamSpec[] = [], pathPrefix = 'taskspec.params'): FieldError | undefined {
  for (const param of params) {
    const error = validateParamType(param, pathPrefix)
    if (error) {
      return error
    }
  }

  return undefined
}
