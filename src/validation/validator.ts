/**
 * Validators
 * ==========
 *
 * `terraform` mode: structural checks, then `terraform init` and
 * `terraform validate -json` in a scoped workspace.
 * `heuristic` mode: structural checks plus heuristics; never spawns a
 * process.
 *
 * Neither validator throws. A missing binary, a timeout or any other
 * failure to run the tool becomes a `toolUnavailable` outcome carrying a
 * `system` diagnostic.
 */

import { randomBytes } from 'node:crypto';
import { silentLogger, type Logger } from '../utils/log.js';
import { parseTerraformOutput } from './diagnostics.js';
import { checkHeuristics, checkStructure } from './structural.js';
import {
  type CommandResult,
  type CommandRunner,
  type Diagnostic,
  type ValidationMode,
  type ValidationOutcome,
  type Validator,
  errorCount,
} from './types.js';
import { spawnCommand, withWorkspace, type Workspace } from './workspace.js';

// =============================================================================
// Configuration
// =============================================================================

export interface ValidatorConfig {
  mode: ValidationMode;

  /**
   * Terraform executable, looked up on PATH unless absolute.
   */
  terraformPath: string;

  /**
   * Bound on each Terraform command.
   */
  timeoutMs: number;
}

export const DEFAULT_VALIDATOR_CONFIG: ValidatorConfig = {
  mode: 'terraform',
  terraformPath: 'terraform',
  timeoutMs: 60000,
};

export interface ValidatorDeps {
  runner?: CommandRunner;
  logger?: Logger;

  /**
   * Parent of the per-invocation workspace directories.
   */
  baseDir?: string;
}

export const INIT_ARGS = ['init', '-backend=false', '-input=false', '-no-color'] as const;
export const VALIDATE_ARGS = ['validate', '-json', '-no-color'] as const;

const PROVIDER_INSTALL_FAILURE =
  /failed to (?:query|install) (?:available )?provider|could not connect to registry|failed to request discovery document/i;

function systemDiagnostic(message: string): Diagnostic {
  return { severity: 'error', message, source: 'system' };
}

function unavailable(message: string): ValidationOutcome {
  return { status: 'toolUnavailable', diagnostics: [systemDiagnostic(message)], structuralPassed: true };
}

// =============================================================================
// Terraform Validator
// =============================================================================

export class TerraformValidator implements Validator {
  readonly mode = 'terraform';
  readonly id: string;

  private readonly config: ValidatorConfig;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly baseDir: string | undefined;

  constructor(config: Partial<ValidatorConfig> = {}, deps: ValidatorDeps = {}) {
    this.id = `validator_${randomBytes(4).toString('hex')}`;
    this.config = { ...DEFAULT_VALIDATOR_CONFIG, ...config, mode: 'terraform' };
    this.runner = deps.runner ?? spawnCommand;
    this.logger = (deps.logger ?? silentLogger).child(`Validator ${this.id}`);
    this.baseDir = deps.baseDir;
  }

  async validate(candidateCode: string): Promise<ValidationOutcome> {
    const structural = checkStructure(candidateCode);
    if (structural.length > 0) {
      this.logger.debug(`structural checks failed (${structural.length})`);
      return { status: 'invalid', diagnostics: structural, structuralPassed: false };
    }

    try {
      const options: { baseDir?: string; logger: Logger } = { logger: this.logger };
      if (this.baseDir !== undefined) options.baseDir = this.baseDir;
      return await withWorkspace(candidateCode, (workspace) => this.runTerraform(workspace), options);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`validation workspace failed: ${message}`);
      return unavailable(`Terraform validation could not run: ${message}`);
    }
  }

  private async runTerraform(workspace: Workspace): Promise<ValidationOutcome> {
    const init = await this.run(INIT_ARGS, workspace);
    const initFailure = this.toolFailure(init, 'init');
    if (initFailure) return initFailure;

    if (init.exit_code !== 0) {
      const output = `${init.stdout}\n${init.stderr}`;
      if (PROVIDER_INSTALL_FAILURE.test(output)) {
        const firstLine = init.stderr.trim().split(/\r?\n/)[0] ?? '';
        this.logger.warn('terraform init could not install providers');
        return unavailable(`Terraform providers could not be installed: ${firstLine}`);
      }
      const diagnostics = parseTerraformOutput(init, 'init', false);
      if (errorCount(diagnostics) === 0) {
        diagnostics.push({
          severity: 'error',
          message: `terraform init exited with code ${init.exit_code}`,
          source: 'terraform',
        });
      }
      return { status: 'invalid', diagnostics, structuralPassed: true };
    }

    const validate = await this.run(VALIDATE_ARGS, workspace);
    const validateFailure = this.toolFailure(validate, 'validate');
    if (validateFailure) return validateFailure;

    const diagnostics = parseTerraformOutput(validate, 'validate', true);
    if (validate.exit_code !== 0 && errorCount(diagnostics) === 0) {
      diagnostics.push({
        severity: 'error',
        message: `terraform validate exited with code ${validate.exit_code}`,
        source: 'terraform',
      });
    }

    const errors = errorCount(diagnostics);
    this.logger.debug(`terraform validate: ${errors} error(s), ${diagnostics.length - errors} warning(s)`);
    return { status: errors > 0 ? 'invalid' : 'valid', diagnostics, structuralPassed: true };
  }

  private run(args: readonly string[], workspace: Workspace): Promise<CommandResult> {
    return this.runner([this.config.terraformPath, ...args], {
      cwd: workspace.dir,
      env: workspace.env,
      timeout_ms: this.config.timeoutMs,
    });
  }

  private toolFailure(result: CommandResult, command: string): ValidationOutcome | null {
    if (result.error_code === 'ENOENT') {
      this.logger.warn(`terraform not found at '${this.config.terraformPath}'`);
      return unavailable(`Terraform CLI not found: '${this.config.terraformPath}' is not installed or not on PATH`);
    }
    if (result.error !== undefined) {
      return unavailable(`terraform ${command} could not be started: ${result.error}`);
    }
    if (result.timed_out) {
      this.logger.warn(`terraform ${command} timed out`);
      return unavailable(`terraform ${command} timed out after ${this.config.timeoutMs}ms`);
    }
    return null;
  }
}

// =============================================================================
// Heuristic Validator
// =============================================================================

export class HeuristicValidator implements Validator {
  readonly mode = 'heuristic';

  async validate(candidateCode: string): Promise<ValidationOutcome> {
    const structural = checkStructure(candidateCode);
    if (structural.length > 0) {
      return { status: 'invalid', diagnostics: structural, structuralPassed: false };
    }
    const diagnostics = checkHeuristics(candidateCode);
    return {
      status: errorCount(diagnostics) > 0 ? 'invalid' : 'valid',
      diagnostics,
      structuralPassed: true,
    };
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createValidator(config: Partial<ValidatorConfig> = {}, deps: ValidatorDeps = {}): Validator {
  const mode = config.mode ?? DEFAULT_VALIDATOR_CONFIG.mode;
  switch (mode) {
    case 'terraform':
      return new TerraformValidator(config, deps);
    case 'heuristic':
      return new HeuristicValidator();
  }
}
