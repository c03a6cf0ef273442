// ---------------------------------------------------------------------------
// Task domain types.
//
// A task is an ordered list of container steps plus the declarations those
// steps may reference: parameters, resources, workspaces and volumes. The
// validator only reads these values, it never fills in defaults.
// ---------------------------------------------------------------------------

// -- Constants ---------------------------------------------------------------

/** Directory under which workspaces without an explicit mount path are mounted. */
export const workspaceDir = '/workspace'

/** Mount prefix reserved for the runtime's own volumes. */
export const reservedMountPrefix = '/tekton/'

/** The one location under the reserved prefix that steps may mount onto. */
export const allowedReservedMountPath = '/tekton/home'

/** Prefix reserved for the runtime's own volume names. */
export const reservedVolumePrefix = 'tekton-internal-'

export const paramTypes = ['string', 'array'] as const

export type ParamType = typeof paramTypes[number]

export const resourceTypes = ['git', 'storage', 'image', 'cluster', 'pullRequest', 'cloudEvent'] as const

export type ResourceType = typeof resourceTypes[number]

// -- Container building blocks -----------------------------------------------

export type EnvVar = {
  name: string;
  value?: string;
}

export type VolumeMount = {
  /** Name of the volume to mount. */
  name: string;
  /** Absolute path inside the container. */
  mountPath: string;
  /** Path within the volume to mount instead of its root. */
  subPath?: string;
}

export type Volume = {
  name: string;
}

/** Container fields shared by steps and the step template. */
export type Container = {
  image?: string;
  command?: string[];
  args?: string[];
  workingDir?: string;
  env?: EnvVar[];
  volumeMounts?: VolumeMount[];
}

/** One execution unit of a task. */
export type Step = Container & {
  /** Optional DNS label, unique within the task when set. */
  name?: string;
  /** Inline script, mutually exclusive with `command`. */
  script?: string;
}

// -- Declarations ------------------------------------------------------------

/** A default value, tagged with the type its shape implies. */
export type ArrayOrString =
  | {type: 'string'; stringVal: string}
  | {type: 'array'; arrayVal: string[]}

export type ParamSpec = {
  name: string;
  /** Declared type. Kept as a plain string so unknown types can be reported. */
  type: string;
  description?: string;
  default?: ArrayOrString;
}

export type TaskResource = {
  name: string;
  /** Declared resource type. Kept as a plain string so unknown types can be reported. */
  type: string;
  targetPath?: string;
  optional?: boolean;
}

/** Resources declared the current way, under `resources`. */
export type TaskResources = {
  inputs?: TaskResource[];
  outputs?: TaskResource[];
}

/** Legacy `inputs` block, superseded by `params` and `resources.inputs`. */
export type Inputs = {
  resources?: TaskResource[];
  params?: ParamSpec[];
}

/** Legacy `outputs` block, superseded by `resources.outputs`. */
export type Outputs = {
  resources?: TaskResource[];
}

export type WorkspaceDeclaration = {
  name: string;
  description?: string;
  /** Absolute mount path; defaults to `/workspace/<name>`. */
  mountPath?: string;
  readOnly?: boolean;
}

// -- Task --------------------------------------------------------------------

export type TaskSpec = {
  steps?: Step[];
  /** Defaults merged into every step before structural checks. */
  stepTemplate?: Container;
  volumes?: Volume[];
  workspaces?: WorkspaceDeclaration[];
  params?: ParamSpec[];
  resources?: TaskResources;
  inputs?: Inputs;
  outputs?: Outputs;
}

export type ObjectMeta = {
  name?: string;
  namespace?: string;
}

export type TaskKind = 'Task' | 'ClusterTask'

export type Task = {
  apiVersion?: string;
  kind: TaskKind;
  metadata: ObjectMeta;
  spec: TaskSpec;
}

/** Mount path a workspace ends up at once its default is applied. */
export function workspaceMountPath(workspace: WorkspaceDeclaration): string {
  return workspace.mountPath ? workspace.mountPath : `${workspaceDir}/${workspace.name}`
}

export function isParamType(type: string): type is ParamType {
  return paramTypes.some(allowed => allowed === type)
}

export function isResourceType(type: string): type is ResourceType {
  return resourceTypes.some(allowed => allowed === type)
}
