/**
 * Validation Types
 * ================
 */

// =============================================================================
// Diagnostics
// =============================================================================

export type Severity = 'error' | 'warning';

/**
 * Where a finding came from.
 * - structural: pre-checks run without any external tool
 * - heuristic: placeholder and missing-field checks
 * - terraform: reported by the Terraform CLI
 * - system: the tool could not run (missing, timed out, crashed)
 */
export type DiagnosticSource = 'structural' | 'heuristic' | 'terraform' | 'system';

export interface Diagnostic {
  severity: Severity;
  message: string;

  /**
   * Resource, block or `file:line` reference when known.
   */
  location?: string;

  source: DiagnosticSource;
}

// =============================================================================
// Outcomes
// =============================================================================

export type ValidationStatus = 'valid' | 'invalid' | 'toolUnavailable';

export interface ValidationOutcome {
  /**
   * `valid` iff no diagnostic has severity `error` and the tool ran.
   */
  status: ValidationStatus;

  /**
   * ORDERING: Structural findings first, then in the order the tool
   * reported them.
   */
  diagnostics: readonly Diagnostic[];

  /**
   * Whether the structural pre-checks passed.
   */
  structuralPassed: boolean;
}

export interface Validator {
  readonly mode: ValidationMode;
  validate(candidateCode: string): Promise<ValidationOutcome>;
}

export type ValidationMode = 'terraform' | 'heuristic';

export const VALIDATION_MODES: readonly ValidationMode[] = ['terraform', 'heuristic'];

export function isValidationMode(value: string): value is ValidationMode {
  return VALIDATION_MODES.some((entry) => entry === value);
}

// =============================================================================
// Process Boundary
// =============================================================================

export interface CommandResult {
  exit_code: number;
  stdout: string;
  stderr: string;

  /**
   * Whether the process was killed after exceeding its timeout.
   */
  timed_out: boolean;

  /**
   * Spawn failure, e.g. the executable was not found.
   */
  error?: string;

  /**
   * Error code of a spawn failure, e.g. `ENOENT`.
   */
  error_code?: string;
}

export interface CommandOptions {
  cwd: string;
  env: Record<string, string | undefined>;
  timeout_ms: number;
}

/**
 * Runs one command and resolves with its result. Never rejects for process
 * failures; those are reported in the result.
 */
export type CommandRunner = (command: readonly string[], options: CommandOptions) => Promise<CommandResult>;

export function errorCount(diagnostics: readonly Diagnostic[]): number {
  return diagnostics.filter((d) => d.severity === 'error').length;
}
