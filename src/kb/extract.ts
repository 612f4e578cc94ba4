/**
 * Term Extraction
 * ===============
 *
 * Tokens, keywords and resource types pulled out of requests, prompts and
 * Terraform source. Shared by knowledge-base construction and both retrieval
 * strategies so that a snippet and a request are described in the same
 * vocabulary.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

// =============================================================================
// Vocabulary
// =============================================================================

export interface ServiceTerm {
  term: string;
  resource: string;
}

export interface Vocabulary {
  stopwords: string[];
  services: ServiceTerm[];
}

/**
 * Word lists shipped beside this module.
 */
export const VOCABULARY_PATH = join(dirname(fileURLToPath(import.meta.url)), 'vocabulary.json');

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseVocabulary(text: string, source = VOCABULARY_PATH): Vocabulary {
  const parsed: unknown = JSON.parse(text);
  if (!isObject(parsed)) throw new Error(`${source}: expected an object`);
  const lists = { stopwords: parsed['stopwords'], services: parsed['services'] };
  if (!Array.isArray(lists.stopwords) || !Array.isArray(lists.services)) {
    throw new Error(`${source}: expected "stopwords" and "services" arrays`);
  }

  const stopwords = lists.stopwords.map((entry: unknown) => {
    if (typeof entry !== 'string') throw new Error(`${source}: stopwords must be strings`);
    return entry;
  });
  const services = lists.services.map((entry: unknown): ServiceTerm => {
    if (!isObject(entry)) throw new Error(`${source}: services must be objects`);
    const { term, resource } = entry;
    if (typeof term !== 'string' || typeof resource !== 'string') {
      throw new Error(`${source}: each service needs a "term" and a "resource"`);
    }
    return { term, resource };
  });

  return { stopwords, services };
}

const vocabulary = parseVocabulary(readFileSync(VOCABULARY_PATH, 'utf-8'));

export const STOPWORDS: ReadonlySet<string> = new Set(vocabulary.stopwords);

interface ServiceMapping {
  readonly pattern: RegExp;
  readonly resource: string;
}

const SERVICE_MAPPINGS: readonly ServiceMapping[] = vocabulary.services.map((entry) => ({
  pattern: new RegExp(`\\b${escapeRegExp(entry.term)}\\b`),
  resource: entry.resource,
}));

const TOKEN_PATTERN = /[a-z0-9]+(?:_[a-z0-9]+)*/g;
const RESOURCE_DECLARATION = /resource\s+"([^"]+)"/gi;
const EXPLICIT_RESOURCE = /aws_[a-z0-9_]+/g;

const TITLE_LENGTH = 70;
const FALLBACK_KEYWORD_LIMIT = 7;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Distinct values in lexicographic order.
 */
export function sortedUnique(values: Iterable<string>): string[] {
  return [...new Set(values)].sort();
}

// =============================================================================
// Tokens
// =============================================================================

/**
 * Components of an underscore-joined term that carry meaning on their own,
 * e.g. `aws_s3_bucket` yields `aws` and `bucket`.
 */
export function termComponents(term: string): string[] {
  if (!term.includes('_')) return [];
  return term.split('_').filter((part) => part.length > 2 && !STOPWORDS.has(part));
}

/**
 * Request tokens: lower-cased words longer than two characters that are not
 * stop words, plus the components of underscore-joined words.
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const match of text.toLowerCase().matchAll(TOKEN_PATTERN)) {
    const token = match[0];
    if (token.length > 2 && !STOPWORDS.has(token)) {
      tokens.push(token);
    }
    tokens.push(...termComponents(token));
  }
  return sortedUnique(tokens);
}

/**
 * Lower-case, trim and drop blank keywords, then add underscore components.
 * Idempotent.
 */
export function normalizeKeywords(keywords: Iterable<string>): string[] {
  const out: string[] = [];
  for (const raw of keywords) {
    const keyword = raw.trim().toLowerCase();
    if (keyword.length === 0) continue;
    out.push(keyword, ...termComponents(keyword));
  }
  return sortedUnique(out);
}

// =============================================================================
// Resource Types
// =============================================================================

/**
 * Resource types declared as `resource "<type>"` in Terraform source.
 */
export function extractResourceTypes(code: string): string[] {
  const types: string[] = [];
  for (const match of code.matchAll(RESOURCE_DECLARATION)) {
    const type = match[1]?.trim().toLowerCase();
    if (type) types.push(type);
  }
  return sortedUnique(types);
}

export function normalizeResourceTypes(types: Iterable<string>): string[] {
  const out: string[] = [];
  for (const raw of types) {
    const type = raw.trim().toLowerCase();
    if (type.length > 0) out.push(type);
  }
  return sortedUnique(out);
}

/**
 * Resource types a request asks for: explicit `aws_*` names plus common
 * service names (`s3`, `load balancer`, ...) matched as whole words.
 */
export function detectRequestResources(text: string): string[] {
  const lower = text.toLowerCase();
  const resources = [...lower.matchAll(EXPLICIT_RESOURCE)].map((match) => match[0]);
  for (const mapping of SERVICE_MAPPINGS) {
    if (mapping.pattern.test(lower)) {
      resources.push(mapping.resource);
    }
  }
  return sortedUnique(resources);
}

// =============================================================================
// Metadata Fallback
// =============================================================================

export function deriveTitle(prompt: string): string {
  return prompt.trim().slice(0, TITLE_LENGTH);
}

/**
 * Up to seven distinct alphanumeric prompt words longer than three
 * characters, in order of first appearance.
 */
export function deriveKeywords(prompt: string): string[] {
  const seen = new Set<string>();
  for (const word of prompt.split(/\s+/)) {
    if (word.length > 3 && /^[a-z0-9]+$/i.test(word)) {
      seen.add(word.toLowerCase());
    }
    if (seen.size === FALLBACK_KEYWORD_LIMIT) break;
  }
  return [...seen];
}
