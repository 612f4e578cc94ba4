/**
 * Terraform Output Parsing
 * ========================
 *
 * Turns `terraform validate -json` output, or the human-readable output of
 * any Terraform command, into Diagnostics.
 *
 * Order of precedence:
 * 1. `validate -json` document (`valid`, `diagnostics[]`)
 * 2. Lines starting with `Error:` / `Warning:` (box-drawing prefix allowed)
 * 3. Unclassified stderr as a single error (ignored after a JSON document
 *    from a command that exited 0)
 * 4. Non-zero exit with nothing parsed as a single error naming the code
 */

import type { CommandResult, Diagnostic, Severity } from './types.js';

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function stringField(obj: Record<string, unknown>, key: string): string | undefined {
  const value = obj[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function terraformDiagnostic(severity: Severity, message: string, location?: string): Diagnostic {
  const diagnostic: Diagnostic = { severity, message, source: 'terraform' };
  if (location !== undefined) diagnostic.location = location;
  return diagnostic;
}

// =============================================================================
// JSON Output
// =============================================================================

function rangeLocation(range: unknown): string | undefined {
  if (!isObject(range)) return undefined;
  const filename = stringField(range, 'filename');
  if (filename === undefined) return undefined;
  const start = range['start'];
  const line = isObject(start) ? start['line'] : undefined;
  return typeof line === 'number' ? `${filename}:${line}` : filename;
}

/**
 * Diagnostics from a `terraform validate -json` document, or `null` when
 * `stdout` is not such a document.
 */
export function parseValidateJson(stdout: string): Diagnostic[] | null {
  const text = stdout.trim();
  if (!text.startsWith('{')) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isObject(parsed) || (!('valid' in parsed) && !('diagnostics' in parsed))) {
    return null;
  }

  const entries = Array.isArray(parsed['diagnostics']) ? parsed['diagnostics'] : [];
  const diagnostics: Diagnostic[] = [];
  for (const entry of entries) {
    if (!isObject(entry)) continue;
    const severity: Severity = entry['severity'] === 'warning' ? 'warning' : 'error';
    const summary = stringField(entry, 'summary') ?? 'Unknown error';
    const detail = stringField(entry, 'detail');
    const message = detail !== undefined ? `${summary}: ${detail}` : summary;
    diagnostics.push(terraformDiagnostic(severity, message, rangeLocation(entry['range'])));
  }

  if (parsed['valid'] === false && diagnostics.every((d) => d.severity !== 'error')) {
    diagnostics.push(terraformDiagnostic('error', 'Terraform reported the configuration as invalid'));
  }
  return diagnostics;
}

// =============================================================================
// Human-Readable Output
// =============================================================================

const BOX_PREFIX = /^[\s│╷╵]*/;
const SEVERITY_PREFIX = /^(error|warning):\s*(.*)$/i;
const SOURCE_REFERENCE = /^on\s+(\S+)\s+line\s+(\d+)/;

/**
 * Diagnostics from lines carrying a recognised severity prefix. An
 * `on <file> line <n>` line following a finding becomes its location.
 */
export function classifyLines(text: string): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  let last: Diagnostic | undefined;

  for (const raw of text.split(/\r?\n/)) {
    const line = raw.replace(BOX_PREFIX, '').trim();
    if (line.length === 0) continue;

    const prefixed = line.match(SEVERITY_PREFIX);
    if (prefixed && prefixed[1] !== undefined && prefixed[2] !== undefined) {
      const severity: Severity = prefixed[1].toLowerCase() === 'warning' ? 'warning' : 'error';
      last = terraformDiagnostic(severity, prefixed[2]);
      diagnostics.push(last);
      continue;
    }

    const reference = line.match(SOURCE_REFERENCE);
    if (last !== undefined && last.location === undefined && reference) {
      last.location = `${reference[1]}:${reference[2]}`;
    }
  }

  return diagnostics;
}

/**
 * Diagnostics for one Terraform command. `json` selects whether stdout is
 * first tried as a `validate -json` document.
 */
export function parseTerraformOutput(result: CommandResult, command: string, json: boolean): Diagnostic[] {
  const document = json ? parseValidateJson(result.stdout) : null;
  const diagnostics = document ?? [...classifyLines(result.stdout), ...classifyLines(result.stderr)];

  // A parsed JSON document is authoritative unless the command failed.
  const stderrCounts = document === null || result.exit_code !== 0;
  const stderr = result.stderr.trim();
  if (stderrCounts && stderr.length > 0) {
    // Stderr the document does not already cover is kept as its own error.
    const covered = document !== null && diagnostics.some((d) => stderr.includes(d.message));
    if (diagnostics.length === 0 || (document !== null && !covered)) {
      diagnostics.push(terraformDiagnostic('error', stderr));
    }
  }

  if (diagnostics.length === 0 && result.exit_code !== 0) {
    diagnostics.push(terraformDiagnostic('error', `terraform ${command} exited with code ${result.exit_code}`));
  }

  return diagnostics;
}
