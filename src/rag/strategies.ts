/**
 * Scoring Strategies
 * ==================
 *
 * Two interchangeable ways to score a snippet against a request, both in
 * [0, 1]. Selected by name from configuration; callers only see the
 * `score` contract.
 */

import { termComponents } from '../kb/extract.js';
import type { SnippetRecord } from '../kb/types.js';
import { SnippetGraph, keywordNode, resourceNode, snippetNode, nodeKind, type GraphStats } from './graph.js';
import type { RequestProfile } from './request.js';

// =============================================================================
// Types
// =============================================================================

export type RetrievalStrategyName = 'keyword' | 'graph';

export const RETRIEVAL_STRATEGIES: readonly RetrievalStrategyName[] = ['keyword', 'graph'];

export function isRetrievalStrategyName(value: string): value is RetrievalStrategyName {
  return RETRIEVAL_STRATEGIES.some((entry) => entry === value);
}

export interface KeywordStrategy {
  readonly kind: 'keyword';
  score(request: RequestProfile, record: SnippetRecord): number;
}

export interface GraphStrategy {
  readonly kind: 'graph';
  score(request: RequestProfile, record: SnippetRecord): number;
  graphStats(): GraphStats;
}

export type RetrievalStrategy = KeywordStrategy | GraphStrategy;

/**
 * Weight of the best directly matched neighbour's score given to a snippet
 * that only shares a resource type with it.
 */
export const SECOND_ORDER_WEIGHT = 0.25;

function clamp01(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  return value >= 1 ? 1 : value;
}

// =============================================================================
// Keyword Strategy
// =============================================================================

/**
 * Overlap between the request and a snippet's descriptors. A resource type
 * named by the request counts twice as much as a matched token:
 *
 *   (2·|R ∩ Rs| + |T ∩ Ks|) / (2·|R| + |T|)
 */
export function createKeywordStrategy(): KeywordStrategy {
  const descriptors = new WeakMap<SnippetRecord, ReadonlySet<string>>();

  const descriptorsOf = (record: SnippetRecord): ReadonlySet<string> => {
    let set = descriptors.get(record);
    if (set === undefined) {
      set = new Set([
        ...record.keywords,
        ...record.resourceTypes,
        ...record.resourceTypes.flatMap(termComponents),
      ]);
      descriptors.set(record, set);
    }
    return set;
  };

  return {
    kind: 'keyword',
    score(request, record) {
      const denominator = 2 * request.resources.length + request.tokens.length;
      if (denominator === 0) return 0;

      const resourceHits = request.resources.filter((type) => record.resourceTypes.includes(type)).length;
      const snippetTerms = descriptorsOf(record);
      const tokenHits = request.tokens.filter((token) => snippetTerms.has(token)).length;

      return clamp01((2 * resourceHits + tokenHits) / denominator);
    },
  };
}

// =============================================================================
// Graph Strategy
// =============================================================================

function requestTerms(request: RequestProfile): string[] {
  return [...new Set([...request.tokens.map(keywordNode), ...request.resources.map(resourceNode)])];
}

/**
 * Each request term adjacent to the snippet contributes `1 / degree(term)`,
 * so terms linked to many snippets weigh less. The sum is divided by the
 * number of request terms. A snippet with no direct hit but a resource type
 * shared with a matched snippet scores `SECOND_ORDER_WEIGHT` times the best
 * such neighbour.
 */
export function createGraphStrategy(records: readonly SnippetRecord[]): GraphStrategy {
  const graph = new SnippetGraph(records);
  const directScores = new WeakMap<RequestProfile, Map<string, number>>();

  const direct = (request: RequestProfile, node: string): number => {
    let cache = directScores.get(request);
    if (cache === undefined) {
      cache = new Map();
      directScores.set(request, cache);
    }
    const cached = cache.get(node);
    if (cached !== undefined) return cached;

    const terms = requestTerms(request);
    let total = 0;
    for (const term of terms) {
      if (graph.adjacent(node, term)) {
        total += 1 / graph.degree(term);
      }
    }
    const value = terms.length === 0 ? 0 : total / terms.length;
    cache.set(node, value);
    return value;
  };

  return {
    kind: 'graph',
    score(request, record) {
      const node = snippetNode(record.id);
      if (!graph.has(node)) return 0;

      const own = direct(request, node);
      if (own > 0) return clamp01(own);

      let bestNeighbour = 0;
      for (const shared of graph.neighbors(node)) {
        if (nodeKind(shared) !== 'resource') continue;
        for (const other of graph.neighbors(shared)) {
          if (other === node) continue;
          bestNeighbour = Math.max(bestNeighbour, direct(request, other));
        }
      }
      return clamp01(SECOND_ORDER_WEIGHT * bestNeighbour);
    },
    graphStats() {
      return graph.stats();
    },
  };
}

// =============================================================================
// Factory
// =============================================================================

/**
 * @param records - The records the strategy will score; the graph strategy
 *   indexes them up front.
 */
export function createStrategy(name: RetrievalStrategyName, records: readonly SnippetRecord[]): RetrievalStrategy {
  switch (name) {
    case 'keyword':
      return createKeywordStrategy();
    case 'graph':
      return createGraphStrategy(records);
  }
}
