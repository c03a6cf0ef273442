import type {Inputs, Outputs, ParamSpec, TaskResource, TaskResources} from '../types.js'

/** Names a scope declares, with the array-typed subset kept apart. */
export type VariableNamespace = {
  names: Set<string>;
  arrays: Set<string>;
}

function emptyNamespace(): VariableNamespace {
  return {names: new Set(), arrays: new Set()}
}

/**
 * Collects parameter names from the current `params` list and, when given,
 * the legacy `inputs.params` list. A name declared in both is one variable.
 */
export function buildParamNamespace(params?: ParamSpec[], legacyParams?: ParamSpec[]): VariableNamespace {
  const namespace = emptyNamespace()
  for (const param of [...(params ?? []), ...(legacyParams ?? [])]) {
    namespace.names.add(param.name)
    if (param.type === 'array') {
      namespace.arrays.add(param.name)
    }
  }

  return namespace
}

/** Collects resource names across the current and legacy declaration blocks. */
export function buildResourceNamespace(resources?: TaskResources, inputs?: Inputs, outputs?: Outputs): VariableNamespace {
  const namespace = emptyNamespace()
  const lists: Array<TaskResource[] | undefined> = [
    resources?.inputs,
    resources?.outputs,
    inputs?.resources,
    outputs?.resources
  ]

  for (const list of lists) {
    for (const resource of list ?? []) {
      namespace.names.add(resource.name)
    }
  }

  return namespace
}
