/**
 * Validation Workspace
 * ====================
 *
 * Scoped execution context for one Terraform invocation.
 *
 * Key guarantees:
 * - Configuration written to `main.tf` in a fresh temp directory
 * - HOME, TMPDIR and TF_DATA_DIR point inside that directory
 * - Every command killed after its timeout
 * - Directory removed by `withWorkspace` on every exit path
 */

import { randomBytes } from 'node:crypto';
import { spawn } from 'node:child_process';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { silentLogger, type Logger } from '../utils/log.js';
import type { CommandOptions, CommandResult, CommandRunner } from './types.js';

// =============================================================================
// Workspace Management
// =============================================================================

export interface Workspace {
  id: string;

  /**
   * Root directory; also the working directory of every command.
   */
  dir: string;

  mainPath: string;

  /**
   * Environment for commands run in this workspace.
   */
  env: Record<string, string | undefined>;
}

/**
 * Cap on captured stdout/stderr per command, in decoded characters.
 */
export const MAX_OUTPUT_BYTES = 1024 * 1024;

/**
 * Writes `main.tf`.
 */
export type ConfigurationWriter = (path: string, configuration: string) => Promise<void>;

const writeConfiguration: ConfigurationWriter = (path, configuration) => writeFile(path, configuration, 'utf-8');

/**
 * Create the directory and write the configuration. A failure part way
 * removes the directory before rethrowing.
 */
export async function createWorkspace(
  configuration: string,
  baseDir: string = tmpdir(),
  write: ConfigurationWriter = writeConfiguration
): Promise<Workspace> {
  const id = randomBytes(6).toString('hex');
  const dir = join(baseDir, `iacgen_tf_${id}`);
  const dataDir = join(dir, '.terraform.d');
  const mainPath = join(dir, 'main.tf');

  try {
    await mkdir(dataDir, { recursive: true });
    await write(mainPath, configuration);
  } catch (error) {
    await rm(dir, { recursive: true, force: true });
    throw error;
  }

  return {
    id,
    dir,
    mainPath,
    env: {
      ...process.env,
      HOME: dir,
      TMPDIR: dir,
      TF_DATA_DIR: dataDir,
      TF_IN_AUTOMATION: '1',
      TF_INPUT: '0',
      CHECKPOINT_DISABLE: '1',
    },
  };
}

/**
 * Remove the workspace directory. Failures are logged, not thrown, so that
 * they never mask the validation result.
 */
export async function cleanupWorkspace(workspace: Workspace, logger: Logger = silentLogger): Promise<void> {
  try {
    await rm(workspace.dir, { recursive: true, force: true });
  } catch (error) {
    logger.warn(
      `failed to remove ${workspace.dir}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Create a workspace, run `fn` in it and remove it afterwards, whether `fn`
 * resolves or rejects.
 */
export async function withWorkspace<T>(
  configuration: string,
  fn: (workspace: Workspace) => Promise<T>,
  options: { baseDir?: string; logger?: Logger } = {}
): Promise<T> {
  const workspace = await createWorkspace(configuration, options.baseDir);
  try {
    return await fn(workspace);
  } finally {
    await cleanupWorkspace(workspace, options.logger);
  }
}

// =============================================================================
// Command Execution
// =============================================================================

function errorCode(err: Error): string | undefined {
  if ('code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

/**
 * Default CommandRunner backed by `child_process.spawn`.
 */
export const spawnCommand: CommandRunner = (command: readonly string[], options: CommandOptions) => {
  const executable = command[0];
  if (!executable) {
    return Promise.resolve({
      exit_code: 1,
      stdout: '',
      stderr: '',
      timed_out: false,
      error: 'Empty command',
    });
  }

  return new Promise<CommandResult>((resolve) => {
    let stdoutData = '';
    let stderrData = '';
    let timedOut = false;
    let resolved = false;

    const proc = spawn(executable, command.slice(1), {
      cwd: options.cwd,
      env: options.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    // Decode across chunk boundaries; Terraform frames diagnostics in box characters.
    proc.stdout?.setEncoding('utf8');
    proc.stderr?.setEncoding('utf8');

    proc.stdout?.on('data', (data: string) => {
      if (stdoutData.length < MAX_OUTPUT_BYTES) {
        stdoutData = (stdoutData + data).slice(0, MAX_OUTPUT_BYTES);
      }
    });

    proc.stderr?.on('data', (data: string) => {
      if (stderrData.length < MAX_OUTPUT_BYTES) {
        stderrData = (stderrData + data).slice(0, MAX_OUTPUT_BYTES);
      }
    });

    const timeout = setTimeout(() => {
      timedOut = true;
      proc.kill('SIGKILL');
    }, options.timeout_ms);

    proc.on('close', (code) => {
      clearTimeout(timeout);
      if (resolved) return;
      resolved = true;

      resolve({
        exit_code: code ?? 1,
        stdout: stdoutData,
        stderr: stderrData,
        timed_out: timedOut,
      });
    });

    proc.on('error', (err) => {
      clearTimeout(timeout);
      if (resolved) return;
      resolved = true;

      const result: CommandResult = {
        exit_code: 1,
        stdout: stdoutData,
        stderr: stderrData,
        timed_out: false,
        error: err.message,
      };
      const code = errorCode(err);
      if (code !== undefined) result.error_code = code;
      resolve(result);
    });
  });
};
