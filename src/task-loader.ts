import {readFile} from 'node:fs/promises'
import {extname} from 'node:path'
import {parseAllDocuments} from 'yaml'
import {DocumentError} from './errors.js'
import type {
  ArrayOrString,
  Container,
  EnvVar,
  Inputs,
  ObjectMeta,
  Outputs,
  ParamSpec,
  Step,
  Task,
  TaskKind,
  TaskResource,
  TaskResources,
  TaskSpec,
  Volume,
  VolumeMount,
  WorkspaceDeclaration
} from './types.js'

type RawObject = Record<string, unknown>

const taskKinds: readonly TaskKind[] = ['Task', 'ClusterTask']

/**
 * Parses a task file into raw documents: every YAML document for `.yaml` and
 * `.yml`, otherwise JSON (a single document or an array of them).
 */
export function parseTaskFile(content: string, filePath: string): unknown[] {
  const ext = extname(filePath).toLowerCase()
  if (ext === '.yaml' || ext === '.yml') {
    return parseYamlDocuments(content, filePath)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error: unknown) {
    throw new DocumentError(filePath, 'invalid JSON', {cause: error})
  }

  return Array.isArray(parsed) ? parsed : [parsed]
}

function parseYamlDocuments(content: string, filePath: string): unknown[] {
  const documents = parseAllDocuments(content)
  for (const [index, document] of documents.entries()) {
    const [first] = document.errors
    if (first) {
      throw new DocumentError(filePath, `document ${index}: ${first.message}`, {cause: first})
    }
  }

  // An empty document (a leading or trailing `---`) holds a null scalar.
  return documents
    .map((document): unknown => document.toJS())
    .filter(value => value !== null && value !== undefined)
}

/**
 * Loads task documents and maps them onto the task model. Documents of other
 * kinds are skipped. Shape errors (a list where an object belongs, a
 * non-string where a string belongs) throw a `DocumentError`; semantic
 * problems are left to the validator.
 */
export class TaskLoader {
  async load(filePath: string): Promise<Task[]> {
    let content: string
    try {
      content = await readFile(filePath, 'utf8')
    } catch (error: unknown) {
      throw new DocumentError(filePath, 'cannot be read', {cause: error})
    }

    return this.parse(content, filePath)
  }

  parse(content: string, filePath: string): Task[] {
    const tasks: Task[] = []
    for (const [index, document] of parseTaskFile(content, filePath).entries()) {
      const reader = new DocumentReader(filePath, index)
      const task = reader.task(document)
      if (task) {
        tasks.push(task)
      }
    }

    return tasks
  }
}

/** Reads one raw document, tracking the file and document index for errors. */
class DocumentReader {
  constructor(
    private readonly filePath: string,
    private readonly index: number
  ) {}

  task(raw: unknown): Task | undefined {
    const document = this.object(raw, '')
    const {kind} = document
    if (!taskKinds.some(taskKind => taskKind === kind)) {
      return undefined
    }

    return {
      apiVersion: this.optionalString(document.apiVersion, 'apiVersion'),
      kind: kind === 'ClusterTask' ? 'ClusterTask' : 'Task',
      metadata: this.metadata(document.metadata),
      spec: this.spec(document.spec)
    }
  }

  private metadata(raw: unknown): ObjectMeta {
    if (raw === undefined || raw === null) {
      return {}
    }

    const metadata = this.object(raw, 'metadata')
    return {
      name: this.optionalString(metadata.name, 'metadata.name'),
      namespace: this.optionalString(metadata.namespace, 'metadata.namespace')
    }
  }

  private spec(raw: unknown): TaskSpec {
    const spec = this.object(raw, 'spec')
    return {
      steps: this.list(spec.steps, 'spec.steps', (step, path) => this.step(step, path)),
      stepTemplate: spec.stepTemplate === undefined || spec.stepTemplate === null
        ? undefined
        : this.container(this.object(spec.stepTemplate, 'spec.stepTemplate'), 'spec.stepTemplate'),
      volumes: this.list(spec.volumes, 'spec.volumes', (volume, path) => this.volume(volume, path)),
      workspaces: this.list(spec.workspaces, 'spec.workspaces', (workspace, path) => this.workspace(workspace, path)),
      params: this.list(spec.params, 'spec.params', (param, path) => this.param(param, path)),
      resources: this.resources(spec.resources),
      inputs: this.inputs(spec.inputs),
      outputs: this.outputs(spec.outputs)
    }
  }

  private container(raw: RawObject, path: string): Container {
    return {
      image: this.optionalString(raw.image, `${path}.image`),
      command: this.stringList(raw.command, `${path}.command`),
      args: this.stringList(raw.args, `${path}.args`),
      workingDir: this.optionalString(raw.workingDir, `${path}.workingDir`),
      env: this.list(raw.env, `${path}.env`, (env, envPath) => this.envVar(env, envPath)),
      volumeMounts: this.list(raw.volumeMounts, `${path}.volumeMounts`, (vm, vmPath) => this.volumeMount(vm, vmPath))
    }
  }

  private step(raw: unknown, path: string): Step {
    const step = this.object(raw, path)
    return {
      name: this.optionalString(step.name, `${path}.name`),
      ...this.container(step, path),
      script: this.optionalString(step.script, `${path}.script`)
    }
  }

  private envVar(raw: unknown, path: string): EnvVar {
    const env = this.object(raw, path)
    return {
      name: this.requiredString(env.name, `${path}.name`),
      value: this.optionalString(env.value, `${path}.value`)
    }
  }

  private volumeMount(raw: unknown, path: string): VolumeMount {
    const vm = this.object(raw, path)
    return {
      name: this.requiredString(vm.name, `${path}.name`),
      mountPath: this.requiredString(vm.mountPath, `${path}.mountPath`),
      subPath: this.optionalString(vm.subPath, `${path}.subPath`)
    }
  }

  private volume(raw: unknown, path: string): Volume {
    const volume = this.object(raw, path)
    return {name: this.requiredString(volume.name, `${path}.name`)}
  }

  private workspace(raw: unknown, path: string): WorkspaceDeclaration {
    const workspace = this.object(raw, path)
    return {
      name: this.requiredString(workspace.name, `${path}.name`),
      description: this.optionalString(workspace.description, `${path}.description`),
      mountPath: this.optionalString(workspace.mountPath, `${path}.mountPath`),
      readOnly: this.optionalBoolean(workspace.readOnly, `${path}.readOnly`)
    }
  }

  /** A missing type is taken from the default's shape, else `string`. */
  private param(raw: unknown, path: string): ParamSpec {
    const param = this.object(raw, path)
    const defaultValue = this.arrayOrString(param.default, `${path}.default`)
    return {
      name: this.requiredString(param.name, `${path}.name`),
      type: this.optionalString(param.type, `${path}.type`) ?? defaultValue?.type ?? 'string',
      description: this.optionalString(param.description, `${path}.description`),
      default: defaultValue
    }
  }

  private arrayOrString(raw: unknown, path: string): ArrayOrString | undefined {
    if (raw === undefined || raw === null) {
      return undefined
    }

    if (typeof raw === 'string') {
      return {type: 'string', stringVal: raw}
    }

    if (Array.isArray(raw)) {
      return {type: 'array', arrayVal: raw.map((item, i) => this.requiredString(item, `${path}[${i}]`))}
    }

    throw this.error(path, 'must be a string or a list of strings')
  }

  private taskResource(raw: unknown, path: string): TaskResource {
    const resource = this.object(raw, path)
    return {
      name: this.requiredString(resource.name, `${path}.name`),
      type: this.requiredString(resource.type, `${path}.type`),
      targetPath: this.optionalString(resource.targetPath, `${path}.targetPath`),
      optional: this.optionalBoolean(resource.optional, `${path}.optional`)
    }
  }

  private resourceList(raw: unknown, path: string): TaskResource[] | undefined {
    return this.list(raw, path, (resource, resourcePath) => this.taskResource(resource, resourcePath))
  }

  private resources(raw: unknown): TaskResources | undefined {
    if (raw === undefined || raw === null) {
      return undefined
    }

    const resources = this.object(raw, 'spec.resources')
    return {
      inputs: this.resourceList(resources.inputs, 'spec.resources.inputs'),
      outputs: this.resourceList(resources.outputs, 'spec.resources.outputs')
    }
  }

  private inputs(raw: unknown): Inputs | undefined {
    if (raw === undefined || raw === null) {
      return undefined
    }

    const inputs = this.object(raw, 'spec.inputs')
    return {
      resources: this.resourceList(inputs.resources, 'spec.inputs.resources'),
      params: this.list(inputs.params, 'spec.inputs.params', (param, path) => this.param(param, path))
    }
  }

  private outputs(raw: unknown): Outputs | undefined {
    if (raw === undefined || raw === null) {
      return undefined
    }

    const outputs = this.object(raw, 'spec.outputs')
    return {resources: this.resourceList(outputs.resources, 'spec.outputs.resources')}
  }

  // -- Primitives --------------------------------------------------------------

  private object(raw: unknown, path: string): RawObject {
    if (!isRawObject(raw)) {
      throw this.error(path, 'must be an object')
    }

    return raw
  }

  private list<T>(raw: unknown, path: string, read: (item: unknown, itemPath: string) => T): T[] | undefined {
    if (raw === undefined || raw === null) {
      return undefined
    }

    if (!Array.isArray(raw)) {
      throw this.error(path, 'must be a list')
    }

    return raw.map((item: unknown, i) => read(item, `${path}[${i}]`))
  }

  private stringList(raw: unknown, path: string): string[] | undefined {
    return this.list(raw, path, (item, itemPath) => this.requiredString(item, itemPath))
  }

  private requiredString(raw: unknown, path: string): string {
    const value = this.optionalString(raw, path)
    if (value === undefined) {
      throw this.error(path, 'is required')
    }

    return value
  }

  // Numbers and booleans are accepted where a string is expected, as YAML
  // authors rarely quote `args: [--retries, 3]`.
  private optionalString(raw: unknown, path: string): string | undefined {
    if (raw === undefined || raw === null) {
      return undefined
    }

    if (typeof raw === 'string') {
      return raw
    }

    if (typeof raw === 'number' || typeof raw === 'boolean') {
      return String(raw)
    }

    throw this.error(path, 'must be a string')
  }

  private optionalBoolean(raw: unknown, path: string): boolean | undefined {
    if (raw === undefined || raw === null) {
      return undefined
    }

    if (typeof raw !== 'boolean') {
      throw this.error(path, 'must be a boolean')
    }

    return raw
  }

  private error(path: string, problem: string): DocumentError {
    const location = path ? `document ${this.index}, ${path}` : `document ${this.index}`
    return new DocumentError(this.filePath, `${location} ${problem}`)
  }
}

function isRawObject(value: unknown): value is RawObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
