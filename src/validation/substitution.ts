import {FieldError} from '../field-error.js'

// -- Scopes ------------------------------------------------------------------
// Each scope is a regular-expression fragment matching the part of a
// placeholder between `$(` and the variable name.

/** `$(params.<name>)` */
export const paramScope = 'params'

/** `$(inputs.params.<name>)`, also accepted as `outputs.params`. */
export const legacyParamScope = String.raw`(?:inputs|outputs)\.params`

/** `$(resources.inputs.<name>)` and `$(resources.outputs.<name>)` */
export const resourceScope = String.raw`resources\.(?:inputs|outputs)`

/** `$(inputs.resources.<name>)` and `$(outputs.resources.<name>)` */
export const legacyResourceScope = String.raw`(?:inputs|outputs)\.resources`

const variablePattern = '[_a-zA-Z][_a-zA-Z0-9.-]*'

/** Where a scanned field lives, used to phrase errors and anchor their paths. */
export type ReferenceLocation = {
  /** Kind of object holding the field, e.g. "step". */
  kind: string;
  /** Path of the container of those objects, e.g. "taskspec.steps". */
  context: string;
}

export const stepLocation: ReferenceLocation = {kind: 'step', context: 'taskspec.steps'}

/** One placeholder found in a field value. */
export type Reference = {
  /** Variable name: the first dotted segment after the scope (`git` in `git.path`). */
  name: string;
  /** The placeholder text, `$(...)` included. */
  expression: string;
  start: number;
  end: number;
  /** True when the placeholder is the whole field value. */
  isWholeField: boolean;
}

function referencePattern(scope: string): RegExp {
  return new RegExp(String.raw`\$\((?:${scope})\.(${variablePattern})\)`, 'g')
}

/**
 * Finds every well-formed placeholder of the given scope in a field value.
 * Anything that does not match the grammar, unbalanced parentheses included,
 * is plain text.
 */
export function scanReferences(value: string, scope: string): Reference[] {
  const references: Reference[] = []
  for (const match of value.matchAll(referencePattern(scope))) {
    const expression = match[0]
    const start = match.index ?? 0
    const [name] = (match[1] ?? '').split('.', 1)
    references.push({
      name,
      expression,
      start,
      end: start + expression.length,
      isWholeField: start === 0 && expression.length === value.length
    })
  }

  return references
}

/** Reports the first reference whose variable is not in `names`. */
export function findUndeclared(
  field: string,
  value: string,
  scope: string,
  names: ReadonlySet<string>,
  location: ReferenceLocation = stepLocation
): FieldError | undefined {
  const undeclared = scanReferences(value, scope).find(reference => !names.has(reference.name))
  if (undeclared) {
    return new FieldError({
      kind: 'UNRESOLVED_VARIABLE',
      reason: `non-existent variable in ${JSON.stringify(value)} for ${location.kind} ${field}`,
      paths: [`${location.context}.${field}`]
    })
  }

  return undefined
}

/** Reports any reference to an array variable: the field cannot hold a list. */
export function findProhibitedArrayUse(
  field: string,
  value: string,
  scope: string,
  arrays: ReadonlySet<string>,
  location: ReferenceLocation = stepLocation
): FieldError | undefined {
  const prohibited = scanReferences(value, scope).find(reference => arrays.has(reference.name))
  if (prohibited) {
    return new FieldError({
      kind: 'ILLEGAL_ARRAY_SPLICE',
      reason: `variable type invalid in ${JSON.stringify(value)} for ${location.kind} ${field}`,
      paths: [`${location.context}.${field}`]
    })
  }

  return undefined
}

/** Reports an array variable sharing its field with any other text. */
export function findNonIsolatedArrayUse(
  field: string,
  value: string,
  scope: string,
  arrays: ReadonlySet<string>,
  location: ReferenceLocation = stepLocation
): FieldError | undefined {
  const spliced = scanReferences(value, scope).find(reference => arrays.has(reference.name) && !reference.isWholeField)
  if (spliced) {
    return new FieldError({
      kind: 'ILLEGAL_ARRAY_SPLICE',
      reason: `variable is not properly isolated in ${JSON.stringify(value)} for ${location.kind} ${field}`,
      paths: [`${location.context}.${field}`]
    })
  }

  return undefined
}
