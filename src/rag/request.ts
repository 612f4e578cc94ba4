/**
 * Request Analysis
 * ================
 */

import { detectRequestResources, tokenize } from '../kb/extract.js';

/**
 * Terms derived from a request, computed once per query and shared by every
 * record scored against it.
 */
export interface RequestProfile {
  readonly text: string;

  /**
   * ORDERING: Sorted, distinct.
   */
  readonly tokens: readonly string[];

  /**
   * Resource types the request names or implies.
   * ORDERING: Sorted, distinct.
   */
  readonly resources: readonly string[];
}

export function analyzeRequest(text: string): RequestProfile {
  return Object.freeze({
    text,
    tokens: Object.freeze(tokenize(text)),
    resources: Object.freeze(detectRequestResources(text)),
  });
}

export function isEmptyRequest(profile: RequestProfile): boolean {
  return profile.tokens.length === 0 && profile.resources.length === 0;
}
