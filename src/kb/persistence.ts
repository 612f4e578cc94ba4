/**
 * Knowledge Base Persistence
 * ==========================
 *
 * JSON Lines storage: one self-contained record per line with fields
 * `id, content, title, keywords[], resourceTypes[]`. Loading skips
 * malformed lines and reports how many were skipped instead of failing the
 * whole file.
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { canonicalize } from '../utils/canonical.js';
import { extractCodeBlock } from '../utils/fences.js';
import { silentLogger, type Logger } from '../utils/log.js';
import { KnowledgeBase } from './knowledge_base.js';
import type { PersistedSnippet, SourceRecord } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface LineIssue {
  /**
   * 1-based line number in the input.
   */
  line: number;
  message: string;
}

export interface ParsedLines<T> {
  records: T[];

  /**
   * Malformed non-blank lines. Always equals `issues.length`.
   */
  skipped: number;

  /**
   * ORDERING: By line number.
   */
  issues: LineIssue[];
}

export interface LoadedKnowledgeBase {
  kb: KnowledgeBase;
  skipped: number;
  issues: LineIssue[];
}

// =============================================================================
// Line Parsing
// =============================================================================

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

type FieldCheck<T> = { ok: true; value: T } | { ok: false; message: string };

function optionalString(obj: Record<string, unknown>, field: string): FieldCheck<string | undefined> {
  const value = obj[field];
  if (value === undefined || value === null) return { ok: true, value: undefined };
  if (typeof value !== 'string') return { ok: false, message: `${field} must be a string` };
  return { ok: true, value };
}

function optionalStringArray(obj: Record<string, unknown>, field: string): FieldCheck<string[] | undefined> {
  const value = obj[field];
  if (value === undefined || value === null) return { ok: true, value: undefined };
  if (!Array.isArray(value)) return { ok: false, message: `${field} must be an array` };
  const out: string[] = [];
  for (const [index, entry] of value.entries()) {
    if (typeof entry !== 'string') {
      return { ok: false, message: `${field}[${index}] must be a string` };
    }
    out.push(entry);
  }
  return { ok: true, value: out };
}

function parseJsonLines<T>(
  text: string,
  decode: (value: Record<string, unknown>) => FieldCheck<T>
): ParsedLines<T> {
  const result: ParsedLines<T> = { records: [], skipped: 0, issues: [] };
  const lines = text.split(/\r?\n/);

  for (const [index, raw] of lines.entries()) {
    const line = raw.trim();
    if (line.length === 0) continue;

    let reason: string;
    try {
      const parsed: unknown = JSON.parse(line);
      if (!isObject(parsed)) {
        reason = 'not a JSON object';
      } else {
        const decoded = decode(parsed);
        if (decoded.ok) {
          result.records.push(decoded.value);
          continue;
        }
        reason = decoded.message;
      }
    } catch (error) {
      reason = `invalid JSON: ${error instanceof Error ? error.message : String(error)}`;
    }

    result.skipped++;
    result.issues.push({ line: index + 1, message: reason });
  }

  return result;
}

function decodeSnippet(obj: Record<string, unknown>): FieldCheck<PersistedSnippet> {
  const id = obj['id'];
  if (typeof id !== 'string' || id.trim().length === 0) {
    return { ok: false, message: 'id must be a non-empty string' };
  }
  const content = obj['content'];
  if (typeof content !== 'string' || content.trim().length === 0) {
    return { ok: false, message: 'content must be a non-empty string' };
  }

  const title = optionalString(obj, 'title');
  if (!title.ok) return title;
  const sourcePrompt = optionalString(obj, 'sourcePrompt');
  if (!sourcePrompt.ok) return sourcePrompt;
  const keywords = optionalStringArray(obj, 'keywords');
  if (!keywords.ok) return keywords;
  const resourceTypes = optionalStringArray(obj, 'resourceTypes');
  if (!resourceTypes.ok) return resourceTypes;

  const snippet: PersistedSnippet = { id, content };
  if (title.value !== undefined) snippet.title = title.value;
  if (sourcePrompt.value !== undefined) snippet.sourcePrompt = sourcePrompt.value;
  if (keywords.value !== undefined) snippet.keywords = keywords.value;
  if (resourceTypes.value !== undefined) snippet.resourceTypes = resourceTypes.value;
  return { ok: true, value: snippet };
}

function decodeSource(obj: Record<string, unknown>): FieldCheck<SourceRecord> {
  const code = obj['iac_code'];
  if (typeof code !== 'string') {
    return { ok: false, message: 'iac_code must be a string' };
  }

  const id = optionalString(obj, 'id');
  if (!id.ok) return id;
  const prompt = optionalString(obj, 'prompt');
  if (!prompt.ok) return prompt;
  const title = optionalString(obj, 'title');
  if (!title.ok) return title;
  const keywords = optionalStringArray(obj, 'keywords');
  if (!keywords.ok) return keywords;

  const source: SourceRecord = { iac_code: extractCodeBlock(code) };
  if (id.value !== undefined) source.id = id.value;
  if (prompt.value !== undefined) source.prompt = prompt.value;
  if (title.value !== undefined) source.title = title.value;
  if (keywords.value !== undefined) source.keywords = keywords.value;
  return { ok: true, value: source };
}

/**
 * Parse persisted knowledge-base lines. Blank lines are ignored and not
 * counted as skipped.
 */
export function parseKnowledgeBaseLines(text: string): ParsedLines<PersistedSnippet> {
  return parseJsonLines(text, decodeSnippet);
}

/**
 * Parse a source dataset: one `{ prompt, iac_code, id?, title?, keywords? }`
 * object per line. Code fences around `iac_code` are removed.
 */
export function parseSourceRecordLines(text: string): ParsedLines<SourceRecord> {
  return parseJsonLines(text, decodeSource);
}

// =============================================================================
// Files
// =============================================================================

/**
 * Read a persisted knowledge base.
 *
 * @throws EmptyDatasetError when no line holds a usable record
 */
export async function loadKnowledgeBase(path: string, logger: Logger = silentLogger): Promise<LoadedKnowledgeBase> {
  const text = await readFile(path, 'utf-8');
  const parsed = parseKnowledgeBaseLines(text);
  for (const issue of parsed.issues) {
    logger.warn(`${path}:${issue.line}: skipped (${issue.message})`);
  }

  const kb = KnowledgeBase.fromSnippets(parsed.records);
  logger.info(`loaded ${kb.size} snippets from ${path} (${parsed.skipped} malformed lines skipped)`);
  return { kb, skipped: parsed.skipped, issues: parsed.issues };
}

/**
 * One canonical JSON object per line, records ordered by id.
 */
export function serializeKnowledgeBase(kb: KnowledgeBase): string {
  const records = [...kb.all()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
  return records
    .map((record) =>
      canonicalize({
        id: record.id,
        content: record.content,
        title: record.title,
        keywords: record.keywords,
        resourceTypes: record.resourceTypes,
        sourcePrompt: record.sourcePrompt,
      })
    )
    .map((line) => line + '\n')
    .join('');
}

export async function saveKnowledgeBase(kb: KnowledgeBase, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, serializeKnowledgeBase(kb), 'utf-8');
}
