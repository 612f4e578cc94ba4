/**
 * Canonical JSON Serialization
 * =============================
 *
 * Deterministic JSON serialization with sorted keys and stable output.
 * Knowledge-base files and session transcripts are written through this,
 * so identical content always produces identical bytes and hashes.
 *
 * Rules:
 * - Objects: keys sorted lexicographically (UTF-16 code units)
 * - Arrays: elements in exact index order
 * - Primitives: standard JSON form
 * - Rejected: NaN, Infinity, BigInt, functions, symbols
 * - Object properties holding `undefined` are omitted
 */

import { createHash } from 'node:crypto';

function isUnsupportedValue(value: unknown): boolean {
  if (typeof value === 'number') {
    return !Number.isFinite(value);
  }
  return (
    typeof value === 'bigint' ||
    typeof value === 'function' ||
    typeof value === 'symbol' ||
    typeof value === 'undefined'
  );
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function canonicalizeValue(value: unknown, path: string): string {
  if (isUnsupportedValue(value)) {
    throw new Error(`Unsupported value at ${path}: ${typeof value} cannot be canonicalized`);
  }

  if (value === null) {
    return 'null';
  }

  if (typeof value === 'string' || typeof value === 'number') {
    return JSON.stringify(value);
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }

  if (Array.isArray(value)) {
    const elements = value.map((el, i) => canonicalizeValue(el, `${path}[${i}]`));
    return '[' + elements.join(',') + ']';
  }

  if (typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => compareKeys(a, b));
    const pairs: string[] = [];
    for (const [key, val] of entries) {
      if (val === undefined) continue;
      pairs.push(`${JSON.stringify(key)}:${canonicalizeValue(val, `${path}.${key}`)}`);
    }
    return '{' + pairs.join(',') + '}';
  }

  throw new Error(`Unknown value type at ${path}: ${typeof value}`);
}

/**
 * Canonicalize a value to a deterministic JSON string (no trailing newline).
 *
 * @throws Error if value contains unsupported types
 */
export function canonicalize(value: unknown): string {
  return canonicalizeValue(value, '$');
}

/**
 * SHA-256 of the canonical form followed by a single LF.
 */
export function canonicalHash(value: unknown): string {
  const bytes = Buffer.from(canonicalize(value) + '\n', 'utf-8');
  return createHash('sha256').update(bytes).digest('hex');
}

/**
 * Derive a short content-addressed ID: `prefix_<first 16 hex chars>`.
 */
export function deriveId(prefix: string, value: unknown): string {
  return `${prefix}_${canonicalHash(value).slice(0, 16)}`;
}

/**
 * Hex SHA-256 of a UTF-8 string.
 */
export function sha256Hex(text: string): string {
  return createHash('sha256').update(text, 'utf-8').digest('hex');
}
