export {validate, validateTask, validateTaskSpec} from './task-validator.js'
export type {ValidationResult, ValidationStage} from './task-validator.js'
export {buildParamNamespace, buildResourceNamespace} from './namespace.js'
export type {VariableNamespace} from './namespace.js'
export {
  scanReferences,
  findUndeclared,
  findProhibitedArrayUse,
  findNonIsolatedArrayUse,
  paramScope,
  legacyParamScope,
  resourceScope,
  legacyResourceScope,
  stepLocation
} from './substitution.js'
export type {Reference, ReferenceLocation} from './substitution.js'
export {
  validateVariables,
  validateArrayUsage,
  validateParameterVariables,
  validateLegacyParameterVariables,
  validateResourceVariables,
  validateLegacyResourceVariables
} from './variables.js'
export {
  cleanPath,
  isDns1123Label,
  validateVolumes,
  validateDeclaredWorkspaces,
  validateSteps,
  validateStepNames,
  validateDeclarationGroups,
  validateTaskResources,
  validateParameterTypes,
  validateParamType,
  validateResourceType,
  checkForDuplicates
} from './structure.js'
export {mergeStepsWithStepTemplate, mergeStepWithTemplate} from './step-template.js'
