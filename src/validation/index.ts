/**
 * Validation Exports
 * ==================
 */

export type {
  Severity,
  DiagnosticSource,
  Diagnostic,
  ValidationStatus,
  ValidationOutcome,
  Validator,
  ValidationMode,
  CommandResult,
  CommandOptions,
  CommandRunner,
} from './types.js';
export { VALIDATION_MODES, errorCount, isValidationMode } from './types.js';

export type { ResourceBlock } from './structural.js';
export { attributeValue, checkHeuristics, checkStructure, findResourceBlocks } from './structural.js';

export { classifyLines, parseTerraformOutput, parseValidateJson } from './diagnostics.js';

export type { ConfigurationWriter, Workspace } from './workspace.js';
export {
  MAX_OUTPUT_BYTES,
  cleanupWorkspace,
  createWorkspace,
  spawnCommand,
  withWorkspace,
} from './workspace.js';

export type { ValidatorConfig, ValidatorDeps } from './validator.js';
export {
  DEFAULT_VALIDATOR_CONFIG,
  HeuristicValidator,
  INIT_ARGS,
  TerraformValidator,
  VALIDATE_ARGS,
  createValidator,
} from './validator.js';
