/**
 * Structural and Heuristic Checks
 * ===============================
 *
 * Pure checks that run before (or instead of) the Terraform CLI. None of
 * them touches the filesystem or spawns a process.
 *
 * Structural checks:
 * - empty: configuration has no non-whitespace content
 * - unbalanced_braces: `{`/`}` counted outside strings and comments
 * - no_resource: no `resource "<type>" "<name>"` block
 *
 * Heuristic checks (heuristic mode only):
 * - aws_instance without `ami`/`instance_type` or with a placeholder value
 * - aws_s3_bucket with an empty or placeholder `bucket` name
 */

import type { Diagnostic } from './types.js';

// =============================================================================
// Scanner
// =============================================================================

interface SignificantChar {
  char: '{' | '}';
  index: number;
  line: number;
}

/**
 * Braces outside string literals and `#`, `//`, `/* *\/` comments, from
 * `start` to the end of `code`.
 */
function* braces(code: string, start = 0): Generator<SignificantChar> {
  let line = 1;
  for (let i = 0; i < start; i++) {
    if (code[i] === '\n') line++;
  }

  let i = start;
  while (i < code.length) {
    const char = code[i];
    const next = code[i + 1];

    if (char === '\n') {
      line++;
      i++;
    } else if (char === '#' || (char === '/' && next === '/')) {
      while (i < code.length && code[i] !== '\n') i++;
    } else if (char === '/' && next === '*') {
      i += 2;
      while (i < code.length && !(code[i] === '*' && code[i + 1] === '/')) {
        if (code[i] === '\n') line++;
        i++;
      }
      i += 2;
    } else if (char === '"') {
      i++;
      while (i < code.length && code[i] !== '"' && code[i] !== '\n') {
        i += code[i] === '\\' ? 2 : 1;
      }
      i++;
    } else if (char === '{' || char === '}') {
      yield { char: char === '{' ? '{' : '}', index: i, line };
      i++;
    } else {
      i++;
    }
  }
}

const RESOURCE_DECLARATION = /resource\s+"[^"]+"\s+"[^"]+"/;
const RESOURCE_BLOCK = /resource\s+"([^"]+)"\s+"([^"]+)"\s*\{/g;

// =============================================================================
// Structural Checks
// =============================================================================

function structural(message: string, location?: string): Diagnostic {
  const diagnostic: Diagnostic = { severity: 'error', message, source: 'structural' };
  if (location !== undefined) diagnostic.location = location;
  return diagnostic;
}

function checkBraces(code: string): Diagnostic | null {
  let depth = 0;
  for (const brace of braces(code)) {
    if (brace.char === '{') {
      depth++;
    } else if (depth === 0) {
      return structural("Unbalanced braces: unexpected '}'", `line ${brace.line}`);
    } else {
      depth--;
    }
  }
  if (depth > 0) {
    return structural(`Unbalanced braces: ${depth} unclosed '{'`);
  }
  return null;
}

/**
 * Cheap checks that must pass before the configuration is worth handing to
 * an external tool. Returns an empty list when the code passes.
 */
export function checkStructure(code: string): Diagnostic[] {
  if (code.trim().length === 0) {
    return [structural('Configuration is empty')];
  }

  const diagnostics: Diagnostic[] = [];
  const braceIssue = checkBraces(code);
  if (braceIssue) diagnostics.push(braceIssue);

  if (!RESOURCE_DECLARATION.test(code)) {
    diagnostics.push(structural('No resource block found'));
  }

  return diagnostics;
}

// =============================================================================
// Heuristic Checks
// =============================================================================

export interface ResourceBlock {
  type: string;
  name: string;

  /**
   * Text between the block's braces.
   */
  body: string;
}

/**
 * Top-level resource blocks with their bodies. A block whose closing brace
 * is missing runs to the end of the input.
 */
export function findResourceBlocks(code: string): ResourceBlock[] {
  const blocks: ResourceBlock[] = [];
  for (const match of code.matchAll(RESOURCE_BLOCK)) {
    const [header, type, name] = match;
    if (type === undefined || name === undefined) continue;

    const bodyStart = (match.index ?? 0) + header.length;
    let depth = 1;
    let bodyEnd = code.length;
    for (const brace of braces(code, bodyStart)) {
      depth += brace.char === '{' ? 1 : -1;
      if (depth === 0) {
        bodyEnd = brace.index;
        break;
      }
    }
    blocks.push({ type, name, body: code.slice(bodyStart, bodyEnd) });
  }
  return blocks;
}

/**
 * Raw value of a top-level `name = value` attribute, with surrounding
 * quotes removed. `null` when the attribute is absent.
 */
export function attributeValue(body: string, name: string): string | null {
  const match = body.match(new RegExp(`^\\s*${name}\\s*=\\s*(.*?)\\s*$`, 'm'));
  if (!match || match[1] === undefined) return null;
  const raw = match[1];
  const quoted = raw.match(/^"(.*)"$/);
  return quoted && quoted[1] !== undefined ? quoted[1] : raw;
}

function isPlaceholder(value: string): boolean {
  const trimmed = value.trim();
  return trimmed.length === 0 || trimmed.includes('...') || /^<.*>$/.test(trimmed);
}

const PLACEHOLDER_BUCKET_PREFIXES = ['my-unique-bucket', 'example-bucket'];

function heuristic(message: string, location: string): Diagnostic {
  return { severity: 'error', message, location, source: 'heuristic' };
}

function checkInstance(block: ResourceBlock, out: Diagnostic[]): void {
  const location = `${block.type}.${block.name}`;

  const ami = attributeValue(block.body, 'ami');
  if (ami === null) {
    out.push(heuristic("Missing 'ami' in aws_instance", location));
  } else if (isPlaceholder(ami)) {
    out.push(heuristic(`Placeholder 'ami' value in aws_instance: "${ami}"`, location));
  }

  const instanceType = attributeValue(block.body, 'instance_type');
  if (instanceType === null) {
    out.push(heuristic("Missing 'instance_type' in aws_instance", location));
  } else if (isPlaceholder(instanceType)) {
    out.push(heuristic(`Placeholder 'instance_type' value in aws_instance: "${instanceType}"`, location));
  }
}

function checkBucket(block: ResourceBlock, out: Diagnostic[]): void {
  const bucket = attributeValue(block.body, 'bucket');
  if (bucket === null) return;
  if (isPlaceholder(bucket) || PLACEHOLDER_BUCKET_PREFIXES.some((prefix) => bucket.startsWith(prefix))) {
    out.push(
      heuristic(`Missing or placeholder 'bucket' name in aws_s3_bucket: "${bucket}"`, `${block.type}.${block.name}`)
    );
  }
}

/**
 * Common mistakes in generated AWS configuration that the Terraform CLI
 * does not flag.
 */
export function checkHeuristics(code: string): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  for (const block of findResourceBlocks(code)) {
    switch (block.type) {
      case 'aws_instance':
        checkInstance(block, diagnostics);
        break;
      case 'aws_s3_bucket':
        checkBucket(block, diagnostics);
        break;
    }
  }
  return diagnostics;
}
