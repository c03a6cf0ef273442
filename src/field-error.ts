import {TaskcheckError} from './errors.js'

/** Kinds of validation failures a task specification can produce. */
export type FieldErrorKind =
  | 'MISSING_REQUIRED_FIELD'
  | 'MUTUALLY_EXCLUSIVE_FIELDS'
  | 'DUPLICATE_NAME'
  | 'PATH_CONFLICT'
  | 'INVALID_ENUM_VALUE'
  | 'TYPE_MISMATCH'
  | 'UNRESOLVED_VARIABLE'
  | 'ILLEGAL_ARRAY_SPLICE'
  | 'INVALID_NAME_SYNTAX'

/** Path of the field being validated, used when the error is about the object itself. */
export const currentField = ''

export type FieldErrorInit = {
  kind: FieldErrorKind;
  /** Short description of what is wrong, without the field paths. */
  reason: string;
  paths: string[];
  /** Optional remediation hint appended on its own line. */
  details?: string;
}

/**
 * Structured validation error pointing at one or more fields of a task.
 *
 * Instances are never mutated: `viaField` and `viaIndex` return copies with
 * prefixed paths, so a nested validator can report paths relative to itself
 * and let its caller anchor them.
 */
export class FieldError extends TaskcheckError {
  readonly kind: FieldErrorKind
  readonly reason: string
  readonly paths: readonly string[]
  readonly details?: string

  constructor(init: FieldErrorInit) {
    super(init.kind, render(init.reason, init.paths, init.details))
    this.name = 'FieldError'
    this.kind = init.kind
    this.reason = init.reason
    this.paths = [...init.paths]
    this.details = init.details
  }

  viaField(...prefix: string[]): FieldError {
    return new FieldError({
      kind: this.kind,
      reason: this.reason,
      paths: this.paths.map(path => flatten([...prefix, path])),
      details: this.details
    })
  }

  viaIndex(index: number): FieldError {
    return this.viaField(`[${index}]`)
  }

  /** Same text as `message`. */
  error(): string {
    return this.message
  }

  override toString(): string {
    return this.message
  }

  toJSON(): FieldErrorInit {
    return {
      kind: this.kind,
      reason: this.reason,
      paths: [...this.paths],
      ...(this.details === undefined ? {} : {details: this.details})
    }
  }
}

export function missingField(...paths: string[]): FieldError {
  return new FieldError({kind: 'MISSING_REQUIRED_FIELD', reason: 'missing field(s)', paths})
}

export function multipleOneOf(...paths: string[]): FieldError {
  return new FieldError({kind: 'MUTUALLY_EXCLUSIVE_FIELDS', reason: 'expected exactly one, got both', paths})
}

export function invalidValue(value: string, path: string, kind: FieldErrorKind): FieldError {
  return new FieldError({kind, reason: `invalid value: ${value}`, paths: [path]})
}

function render(reason: string, paths: readonly string[], details?: string): string {
  const head = `${reason}: ${paths.join(', ')}`
  return details ? `${head}\n${details}` : head
}

function isIndex(part: string): boolean {
  return part.startsWith('[') && part.endsWith(']')
}

// Joins path segments with dots, dropping empty segments and gluing index
// segments onto the segment before them ("steps" + "[2]" -> "steps[2]").
function flatten(parts: string[]): string {
  const result: string[] = []
  for (const part of parts) {
    for (const segment of part.split('.')) {
      if (segment === currentField) {
        continue
      }

      if (result.length > 0 && isIndex(segment)) {
        result[result.length - 1] += segment
      } else {
        result.push(segment)
      }
    }
  }

  return result.join('.')
}
