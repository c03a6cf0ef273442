/**
 * Task validation for programmatic use.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {TaskLoader, validateTask} from 'taskcheck'
 *
 * const [task] = await new TaskLoader().load('build.yaml')
 * const error = validateTask(task)
 * if (error) {
 *   console.error(error.message)
 * }
 * ```
 */

export * from './validation/index.js'

export {TaskLoader, parseTaskFile} from './task-loader.js'

export {
  FieldError,
  currentField,
  missingField,
  multipleOneOf,
  invalidValue,
  type FieldErrorKind,
  type FieldErrorInit
} from './field-error.js'

export {TaskcheckError, DocumentError, ConfigError} from './errors.js'

export * from './types.js'
